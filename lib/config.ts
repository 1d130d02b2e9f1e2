import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import { ConfigurationError } from "./errors";
import type { SamplingParams } from "./pipeline/core/types";

const configSchema = z.object({
  images_dir: z.string().optional(),
  preprocessed_dir: z.string().optional(),
  results_dir: z.string().optional(),
  preprocess: z
    .object({
      max_width: z.number().int().min(1).optional(),
      jpeg_quality: z.number().int().min(1).max(100).optional(),
      on_error: z.enum(["abort", "skip"]).optional(),
    })
    .optional(),
  extraction: z
    .object({
      max_tokens: z.number().int().min(1).optional(),
      top_p: z.number().min(0).max(1).optional(),
      top_k: z.number().int().min(0).optional(),
      presence_penalty: z.number().optional(),
      frequency_penalty: z.number().optional(),
      temperature: z.number().min(0).optional(),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

export type FailurePolicy = "abort" | "skip";

export interface Directories {
  imagesDir: string;
  preprocessedDir: string;
  resultsDir: string;
}

export interface PreprocessSettings {
  maxWidth: number;
  jpegQuality: number;
  onError: FailurePolicy;
}

export const DEFAULT_MAX_WIDTH = 4000;
export const DEFAULT_JPEG_QUALITY = 90;

export function loadConfig(configPath?: string): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError(`Config file not found: ${resolved}`);
  }
  const raw = yaml.load(fs.readFileSync(resolved, "utf-8"));
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid config in ${resolved}: ${formatIssues(result.error.issues)}`
    );
  }
  return result.data;
}

export function getDirectories(cfg: AppConfig): Directories {
  return {
    imagesDir: path.resolve(cfg.images_dir ?? "images"),
    preprocessedDir: path.resolve(cfg.preprocessed_dir ?? "preprocessed_images"),
    resultsDir: path.resolve(cfg.results_dir ?? "results"),
  };
}

export function getPreprocessSettings(cfg: AppConfig): PreprocessSettings {
  return {
    maxWidth: cfg.preprocess?.max_width ?? DEFAULT_MAX_WIDTH,
    jpegQuality: cfg.preprocess?.jpeg_quality ?? DEFAULT_JPEG_QUALITY,
    onError: cfg.preprocess?.on_error ?? "abort",
  };
}

export function getSamplingParams(cfg: AppConfig): SamplingParams {
  const e = cfg.extraction ?? {};
  return {
    maxTokens: e.max_tokens ?? 4096,
    topP: e.top_p ?? 1,
    topK: e.top_k ?? 100,
    presencePenalty: e.presence_penalty ?? 0,
    frequencyPenalty: e.frequency_penalty ?? 0,
    temperature: e.temperature ?? 0,
  };
}

// ============================================================================
// Credentials
// ============================================================================

const credentialsSchema = z.object({
  EXTRACTION_API_KEY: z.string().min(1),
  EXTRACTION_ENDPOINT: z.url(),
  EXTRACTION_MODEL: z.string().min(1),
});

export interface ExtractorCredentials {
  apiKey: string;
  endpoint: string;
  model: string;
}

/**
 * Read the model endpoint credentials from an environment map.
 * Callers pass `process.env`; nothing here reads it implicitly.
 */
export function loadCredentials(
  env: Record<string, string | undefined>
): ExtractorCredentials {
  const result = credentialsSchema.safeParse({
    EXTRACTION_API_KEY: env.EXTRACTION_API_KEY || undefined,
    EXTRACTION_ENDPOINT: env.EXTRACTION_ENDPOINT || undefined,
    EXTRACTION_MODEL: env.EXTRACTION_MODEL || undefined,
  });
  if (!result.success) {
    const names = [...new Set(result.error.issues.map((i) => String(i.path[0])))];
    throw new ConfigurationError(
      `Missing or invalid extraction credentials: ${names.join(", ")}`
    );
  }
  return {
    apiKey: result.data.EXTRACTION_API_KEY,
    endpoint: result.data.EXTRACTION_ENDPOINT,
    model: result.data.EXTRACTION_MODEL,
  };
}

function formatIssues(issues: { path: PropertyKey[]; message: string }[]): string {
  return issues
    .map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}
