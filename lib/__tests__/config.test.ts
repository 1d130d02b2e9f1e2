import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  loadConfig,
  loadCredentials,
  getDirectories,
  getPreprocessSettings,
  getSamplingParams,
} from "../config.js";
import { ConfigurationError } from "../errors.js";

describe("config", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "config-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(text: string): string {
    const file = path.join(tmpDir, "config.yaml");
    fs.writeFileSync(file, text);
    return file;
  }

  it("loads the repository config", () => {
    const config = loadConfig();
    expect(getPreprocessSettings(config)).toEqual({
      maxWidth: 4000,
      jpegQuality: 90,
      onError: "abort",
    });
    expect(getSamplingParams(config)).toEqual({
      maxTokens: 4096,
      topP: 1,
      topK: 100,
      presencePenalty: 0,
      frequencyPenalty: 0,
      temperature: 0,
    });
  });

  it("falls back to defaults for an empty file", () => {
    const config = loadConfig(writeConfig(""));
    expect(getDirectories(config)).toEqual({
      imagesDir: path.resolve("images"),
      preprocessedDir: path.resolve("preprocessed_images"),
      resultsDir: path.resolve("results"),
    });
    expect(getPreprocessSettings(config).onError).toBe("abort");
    expect(getSamplingParams(config).topK).toBe(100);
  });

  it("applies overrides", () => {
    const config = loadConfig(
      writeConfig(
        [
          "images_dir: scans",
          "preprocess:",
          "  max_width: 1200",
          "  on_error: skip",
          "extraction:",
          "  temperature: 0.2",
          "",
        ].join("\n")
      )
    );
    expect(getDirectories(config).imagesDir).toBe(path.resolve("scans"));
    expect(getPreprocessSettings(config)).toEqual({
      maxWidth: 1200,
      jpegQuality: 90,
      onError: "skip",
    });
    expect(getSamplingParams(config).temperature).toBe(0.2);
  });

  it("rejects out-of-range values", () => {
    const file = writeConfig("preprocess:\n  jpeg_quality: 150\n");
    expect(() => loadConfig(file)).toThrow(ConfigurationError);
    expect(() => loadConfig(file)).toThrow(/preprocess\.jpeg_quality/);
  });

  it("rejects a missing file", () => {
    expect(() => loadConfig(path.join(tmpDir, "nope.yaml"))).toThrow(
      ConfigurationError
    );
  });
});

describe("loadCredentials", () => {
  const env = {
    EXTRACTION_API_KEY: "test-secret",
    EXTRACTION_ENDPOINT: "https://inference.test/v1/chat/completions",
    EXTRACTION_MODEL: "test-vision-model",
  };

  it("reads all three values", () => {
    expect(loadCredentials(env)).toEqual({
      apiKey: "test-secret",
      endpoint: "https://inference.test/v1/chat/completions",
      model: "test-vision-model",
    });
  });

  it("names every missing value", () => {
    expect(() => loadCredentials({ EXTRACTION_MODEL: "m" })).toThrow(
      "Missing or invalid extraction credentials: EXTRACTION_API_KEY, EXTRACTION_ENDPOINT"
    );
  });

  it("treats empty strings as missing", () => {
    expect(() => loadCredentials({ ...env, EXTRACTION_API_KEY: "" })).toThrow(
      "Missing or invalid extraction credentials: EXTRACTION_API_KEY"
    );
  });

  it("rejects an endpoint that is not a URL", () => {
    expect(() => loadCredentials({ ...env, EXTRACTION_ENDPOINT: "inference" })).toThrow(
      ConfigurationError
    );
  });
});
