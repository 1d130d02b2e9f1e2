export interface ImageStats {
  fileName: string;
  outputFileName: string;
  originalBytes: number;
  finalBytes: number;
  durationMs: number;
  /** Binarization threshold after the filename offset. */
  threshold: number;
}

export interface ImageFailure {
  fileName: string;
  message: string;
}

export interface BatchSummary {
  totalImages: number;
  totalProcessingMs: number;
  combinedOriginalBytes: number;
  combinedFinalBytes: number;
  reducedBytes: number;
  reducedPct: number;
  totalRuntimeMs: number;
}

export interface PreprocessReport {
  images: ImageStats[];
  failures: ImageFailure[];
  summary: BatchSummary;
}

export function summarizeBatch(
  images: Pick<ImageStats, "originalBytes" | "finalBytes" | "durationMs">[],
  totalRuntimeMs: number
): BatchSummary {
  let totalProcessingMs = 0;
  let combinedOriginalBytes = 0;
  let combinedFinalBytes = 0;
  for (const img of images) {
    totalProcessingMs += img.durationMs;
    combinedOriginalBytes += img.originalBytes;
    combinedFinalBytes += img.finalBytes;
  }
  return {
    totalImages: images.length,
    totalProcessingMs,
    combinedOriginalBytes,
    combinedFinalBytes,
    reducedBytes: combinedOriginalBytes - combinedFinalBytes,
    reducedPct:
      combinedOriginalBytes > 0
        ? 100 * (1 - combinedFinalBytes / combinedOriginalBytes)
        : 0,
    totalRuntimeMs,
  };
}

export function formatSummaryLines(summary: BatchSummary): string[] {
  return [
    `Total images processed:          ${summary.totalImages}`,
    `Total local preprocessing time:  ${(summary.totalProcessingMs / 1000).toFixed(4)} sec`,
    `Combined original size:          ${summary.combinedOriginalBytes} bytes`,
    `Combined final size:             ${summary.combinedFinalBytes} bytes`,
    `Size reduced (absolute):         ${summary.reducedBytes} bytes`,
    `Size reduced (percentage):       ${summary.reducedPct.toFixed(2)}%`,
    `Total runtime (all steps):       ${summary.totalRuntimeMs.toFixed(2)} ms`,
  ];
}

/** Text written to processing_results.txt. */
export function formatProcessingReport(report: PreprocessReport): string {
  const out: string[] = ["=== IMAGE PREPROCESSING RESULTS ===", ""];

  for (const img of report.images) {
    out.push(
      `Preprocessed: ${img.fileName}`,
      `  - Original size: ${img.originalBytes} bytes`,
      `  - Final size: ${img.finalBytes} bytes`,
      `  - Processing time: ${img.durationMs.toFixed(2)} ms`,
      ""
    );
  }

  if (report.failures.length > 0) {
    out.push("=== SKIPPED ===");
    for (const f of report.failures) {
      out.push(`Skipped: ${f.fileName}`, `  - ${f.message}`);
    }
    out.push("");
  }

  out.push("", "=== SUMMARY ===", ...formatSummaryLines(report.summary));
  return out.join("\n") + "\n";
}
