#!/usr/bin/env node
/**
 * Preprocess CLI
 *
 * Binarizes every image of the images folder into the preprocessed folder
 * and writes results/processing_results.txt.
 *
 * Usage:
 *   npm run preprocess [-- --config <path>]
 */

import path from "node:path";
import {
  getDirectories,
  getPreprocessSettings,
  loadConfig,
} from "../config";
import {
  preprocess,
  PROCESSING_RESULTS_FILE,
} from "../pipeline/preprocess/preprocess";
import { formatSummaryLines } from "../pipeline/preprocess/report";
import { parseFlags, runWithProgress } from "./progress";

async function main() {
  const flags = parseFlags(process.argv.slice(2));
  const config = loadConfig(flags.config);
  const dirs = getDirectories(config);
  const settings = getPreprocessSettings(config);

  const last = await runWithProgress(
    preprocess({
      inputDir: dirs.imagesDir,
      outputDir: dirs.preprocessedDir,
      resultsDir: dirs.resultsDir,
      maxWidth: settings.maxWidth,
      quality: settings.jpegQuality,
      onError: settings.onError,
    }),
    (p) => ({ current: p.current, total: p.total }),
    { label: "preprocess", unit: "images" }
  );

  if (last?.phase !== "done") {
    throw new Error("Preprocessing finished without a report");
  }
  const { report } = last;

  console.log("\n=== PROCESS COMPLETE ===");
  for (const line of formatSummaryLines(report.summary)) {
    console.log(line);
  }
  for (const failure of report.failures) {
    console.error(`Skipped ${failure.fileName}: ${failure.message}`);
  }
  console.log(`\nResults saved to: ${path.join(dirs.resultsDir, PROCESSING_RESULTS_FILE)}`);
}

main().catch((err) => {
  console.error("\nPreprocessing failed:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
