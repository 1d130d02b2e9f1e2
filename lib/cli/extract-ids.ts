#!/usr/bin/env node
/**
 * Extraction CLI
 *
 * Sends every preprocessed image in one request to the vision model and
 * writes the parsed records to results/text_extracted_results.txt.
 *
 * Credentials come from EXTRACTION_API_KEY, EXTRACTION_ENDPOINT and
 * EXTRACTION_MODEL (a .env file in the working directory is read first).
 *
 * Usage:
 *   npm run extract [-- --config <path>]
 */

import * as dotenv from "dotenv";
dotenv.config();

import path from "node:path";
import {
  getDirectories,
  getSamplingParams,
  loadConfig,
  loadCredentials,
} from "../config";
import {
  extractIds,
  EXTRACTION_RESULTS_FILE,
} from "../pipeline/extraction/extraction";
import { formatStatistics } from "../pipeline/extraction/report";
import { parseFlags, runWithProgress } from "./progress";

async function main() {
  const flags = parseFlags(process.argv.slice(2));
  const config = loadConfig(flags.config);
  const dirs = getDirectories(config);
  const credentials = loadCredentials(process.env);

  console.log(`Loaded Endpoint: ${credentials.endpoint}`);
  console.log(`Loaded Model: ${credentials.model}`);

  const last = await runWithProgress(
    extractIds({
      inputDir: dirs.preprocessedDir,
      resultsDir: dirs.resultsDir,
      credentials,
      sampling: getSamplingParams(config),
    }),
    (p) => ({ current: p.phase === "done" ? 1 : 0, total: 1 }),
    { label: "extract", unit: "request" }
  );

  if (last?.phase !== "done") {
    throw new Error("Extraction finished without a report");
  }
  const { report } = last;

  if (report.parseNote) {
    console.error(report.parseNote);
  } else {
    console.log(`\nParsed ${report.records.length} record(s):`);
    console.log(JSON.stringify(report.records, null, 4));
  }
  console.log("\n" + formatStatistics(report));
  console.log(`\nResults saved to: ${path.join(dirs.resultsDir, EXTRACTION_RESULTS_FILE)}`);
}

main().catch((err) => {
  console.error("\nExtraction failed:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
