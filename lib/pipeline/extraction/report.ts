import type { IdentityRecord } from "../core/schemas";
import { ZERO_USAGE, type TokenUsage } from "../core/types";

export interface ExtractionReport {
  imageFiles: string[];
  records: IdentityRecord[];
  /** Why no records were produced, when the reply could not be parsed. */
  parseNote?: string;
  usage: TokenUsage;
  apiCalls: number;
  durationMs: number;
  averageMsPerImage: number;
}

function usageLines(usage: TokenUsage): string[] {
  return [
    "--- Usage / Token Statistics ---",
    `  Prompt tokens: ${usage.promptTokens}`,
    `  Completion tokens: ${usage.completionTokens}`,
    `  Total tokens used: ${usage.totalTokens}`,
  ];
}

export function formatStatistics(report: ExtractionReport): string {
  return [
    "--- Performance & Design Statistics ---",
    `Number of images processed: ${report.imageFiles.length}`,
    `Total number of API calls: ${report.apiCalls}`,
    `Total time for request: ${report.durationMs.toFixed(2)} ms`,
    `Average time per image: ${report.averageMsPerImage.toFixed(2)} ms`,
    "",
    ...usageLines(report.usage),
  ].join("\n");
}

/** Text written to text_extracted_results.txt. */
export function formatExtractionReport(report: ExtractionReport): string {
  let out = "";
  for (const record of report.records) {
    out += JSON.stringify(record, null, 4) + "\n\n";
  }
  if (report.parseNote) {
    out += report.parseNote + "\n";
  }
  out += "\n" + formatStatistics(report) + "\n";
  return out;
}

/**
 * Results file for a run whose request failed: the error, then counters
 * with zero usage.
 */
export function formatExtractionFailure(
  imageCount: number,
  message: string
): string {
  return [
    message,
    "",
    "--- Performance & Design Statistics ---",
    `Number of images processed: ${imageCount}`,
    "Total number of API calls: 1",
    "",
    ...usageLines(ZERO_USAGE),
    "",
  ].join("\n");
}
