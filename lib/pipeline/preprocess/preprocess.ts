import fs from "node:fs";
import path from "node:path";
import { Observable } from "rxjs";
import type { FailurePolicy } from "../../config";
import { DecodeError } from "../../errors";
import { binarizationOffset } from "../id-type";
import { listImageFiles } from "../images";
import { preprocessedFileName } from "../slug";
import { preprocessImage } from "./binarize";
import {
  formatProcessingReport,
  summarizeBatch,
  type ImageFailure,
  type ImageStats,
  type PreprocessReport,
} from "./report";

export const PROCESSING_RESULTS_FILE = "processing_results.txt";

export interface PreprocessOptions {
  inputDir: string;
  outputDir: string;
  maxWidth: number;
  quality: number;
  onError?: FailurePolicy;
}

export type PreprocessProgress =
  | { phase: "processing"; current: number; total: number; fileName: string }
  | { phase: "done"; current: number; total: number; report: PreprocessReport };

/**
 * Preprocess every image of `inputDir` in name order, one at a time, writing
 * `{normalized}_preprocessed.jpg` files into `outputDir`.
 */
export async function preprocessDirectory(
  options: PreprocessOptions,
  onProgress?: (progress: { current: number; total: number; fileName: string }) => void
): Promise<PreprocessReport> {
  const runStart = performance.now();
  const files = listImageFiles(options.inputDir);
  fs.mkdirSync(options.outputDir, { recursive: true });

  const images: ImageStats[] = [];
  const failures: ImageFailure[] = [];

  for (let i = 0; i < files.length; i++) {
    const fileName = files[i];
    onProgress?.({ current: i, total: files.length, fileName });

    const sourcePath = path.join(options.inputDir, fileName);
    const originalBytes = fs.statSync(sourcePath).size;

    const t0 = performance.now();
    let encoded: Buffer;
    let threshold: number;
    try {
      const input = readSource(sourcePath);
      const processed = await preprocessImage(input, {
        offset: binarizationOffset(fileName),
        maxWidth: options.maxWidth,
        quality: options.quality,
        sourceName: sourcePath,
      });
      encoded = processed.encoded;
      threshold = processed.threshold;
    } catch (err) {
      if (options.onError === "skip" && err instanceof DecodeError) {
        failures.push({ fileName, message: err.message });
        continue;
      }
      throw err;
    }
    const durationMs = performance.now() - t0;

    const outputFileName = preprocessedFileName(fileName);
    fs.writeFileSync(path.join(options.outputDir, outputFileName), encoded);

    images.push({
      fileName,
      outputFileName,
      originalBytes,
      finalBytes: encoded.length,
      durationMs,
      threshold,
    });
  }

  const totalRuntimeMs = performance.now() - runStart;
  return {
    images,
    failures,
    summary: summarizeBatch(images, totalRuntimeMs),
  };
}

/**
 * Observable wrapper used by the CLI: streams progress, writes the results
 * file and finishes with a "done" event carrying the report.
 */
export function preprocess(
  options: PreprocessOptions & { resultsDir: string }
): Observable<PreprocessProgress> {
  return new Observable<PreprocessProgress>((subscriber) => {
    void (async () => {
      try {
        const report = await preprocessDirectory(options, (p) =>
          subscriber.next({ phase: "processing", ...p })
        );
        fs.mkdirSync(options.resultsDir, { recursive: true });
        fs.writeFileSync(
          path.join(options.resultsDir, PROCESSING_RESULTS_FILE),
          formatProcessingReport(report)
        );
        const total = report.images.length + report.failures.length;
        subscriber.next({ phase: "done", current: total, total, report });
        subscriber.complete();
      } catch (err) {
        subscriber.error(err);
      }
    })();
  });
}

function readSource(sourcePath: string): Buffer {
  try {
    return fs.readFileSync(sourcePath);
  } catch (err) {
    throw new DecodeError(sourcePath, { cause: err });
  }
}
