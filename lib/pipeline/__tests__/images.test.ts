import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "@/lib/errors";
import { listImageFiles, mediaTypeFor, toDataUri } from "../images";

describe("listImageFiles", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "images-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns image files sorted by name", () => {
    for (const name of ["b.jpg", "a.PNG", "c.jpeg", "notes.txt"]) {
      fs.writeFileSync(path.join(tmpDir, name), "x");
    }
    expect(listImageFiles(tmpDir)).toEqual(["a.PNG", "b.jpg", "c.jpeg"]);
  });

  it("throws ConfigurationError for an empty folder", () => {
    expect(() => listImageFiles(tmpDir)).toThrow(ConfigurationError);
  });

  it("throws ConfigurationError for a missing folder", () => {
    expect(() => listImageFiles(path.join(tmpDir, "missing"))).toThrow(
      ConfigurationError
    );
  });
});

describe("toDataUri", () => {
  it("encodes bytes as base64 with the media type", () => {
    expect(toDataUri("a.jpg", Buffer.from("hi"))).toBe(
      "data:image/jpeg;base64,aGk="
    );
    expect(mediaTypeFor("scan.PNG")).toBe("image/png");
  });
});
