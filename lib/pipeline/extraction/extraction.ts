import fs from "node:fs";
import path from "node:path";
import { Observable } from "rxjs";
import type { ExtractorCredentials } from "../../config";
import { NetworkError } from "../../errors";
import { IDENTITY_FIELDS, MISSING_VALUE } from "../core/schemas";
import { createHttpTransport } from "../core/http-transport";
import type {
  ChatCompletionRequest,
  ChatTransport,
  SamplingParams,
} from "../core/types";
import { detectIdType } from "../id-type";
import { listImageFiles } from "../images";
import { appendLogEntry, sanitizeMessages, type LlmLogEntry } from "../llm-log";
import { renderPrompt } from "../prompt";
import { ExtractionRequestBuilder } from "./request-builder";
import {
  formatExtractionFailure,
  formatExtractionReport,
  type ExtractionReport,
} from "./report";
import { parseCompletionResponse } from "./response-parser";

export const EXTRACTION_RESULTS_FILE = "text_extracted_results.txt";
export const LLM_LOG_FILE = "llm-log.jsonl";

export interface CreateIdExtractorOptions {
  credentials: ExtractorCredentials;
  sampling: SamplingParams;
  /** Defaults to an HTTP transport built from the credentials. */
  transport?: ChatTransport;
  /** JSONL file receiving one entry per model call. */
  logFile?: string;
}

export type ExtractionPhase = "loading" | "calling-llm";

export interface IdExtractor {
  buildRequest(
    inputDir: string
  ): Promise<{ imageFiles: string[]; request: ChatCompletionRequest }>;
  extract(
    inputDir: string,
    onPhase?: (phase: ExtractionPhase, imageCount: number) => void
  ): Promise<ExtractionReport>;
}

/**
 * Create an extractor bound to one endpoint configuration.
 *
 * Every image of the input directory goes into a single request; the reply
 * is parsed into one record per image.
 */
export function createIdExtractor(options: CreateIdExtractorOptions): IdExtractor {
  const { credentials, sampling, logFile } = options;
  const transport =
    options.transport ??
    createHttpTransport({
      endpoint: credentials.endpoint,
      apiKey: credentials.apiKey,
    });

  async function buildRequest(
    inputDir: string,
    imageFiles: string[] = listImageFiles(inputDir)
  ) {
    const instructions = await renderPrompt("id_extraction", {
      fields: IDENTITY_FIELDS,
      missing_value: MISSING_VALUE,
    });

    const builder = new ExtractionRequestBuilder(instructions);
    for (const fileName of imageFiles) {
      const caption = await renderPrompt("image_caption", {
        file_name: fileName,
        id_type: detectIdType(fileName),
      });
      builder.addImage({
        fileName,
        bytes: fs.readFileSync(path.join(inputDir, fileName)),
        caption,
      });
    }

    return {
      imageFiles,
      request: builder.build({ model: credentials.model, sampling }),
    };
  }

  function log(entry: Omit<LlmLogEntry, "timestamp" | "taskType" | "modelId">): void {
    if (!logFile) return;
    appendLogEntry(logFile, {
      timestamp: new Date().toISOString(),
      taskType: "id-extraction",
      modelId: credentials.model,
      ...entry,
    });
  }

  return {
    buildRequest,

    async extract(inputDir, onPhase) {
      const imageFiles = listImageFiles(inputDir);
      onPhase?.("loading", imageFiles.length);
      const { request } = await buildRequest(inputDir, imageFiles);

      onPhase?.("calling-llm", imageFiles.length);
      const t0 = performance.now();
      let body: string;
      try {
        body = await transport.send(request);
      } catch (err) {
        log({
          imageCount: imageFiles.length,
          durationMs: performance.now() - t0,
          status: "network-error",
          error: err instanceof Error ? err.message : String(err),
          messages: sanitizeMessages(request.messages),
        });
        throw err;
      }
      const durationMs = performance.now() - t0;

      const parsed = parseCompletionResponse(body);
      log({
        imageCount: imageFiles.length,
        durationMs,
        status: parsed.parseError ? "parse-error" : "ok",
        usage: parsed.usage,
        error: parsed.parseError?.message,
        messages: sanitizeMessages(request.messages),
      });

      return {
        imageFiles,
        records: parsed.records,
        parseNote: parsed.parseError?.message,
        usage: parsed.usage,
        apiCalls: 1,
        durationMs,
        averageMsPerImage: durationMs / imageFiles.length,
      };
    },
  };
}

// ============================================================================
// CLI-facing wrapper
// ============================================================================

export type ExtractionProgress =
  | { phase: ExtractionPhase; imageCount: number }
  | { phase: "done"; imageCount: number; report: ExtractionReport };

export interface ExtractIdsOptions extends CreateIdExtractorOptions {
  inputDir: string;
  resultsDir: string;
}

/**
 * Run the extraction and write text_extracted_results.txt. A failed request
 * still leaves a results file with the error and zero usage before the error
 * is passed on.
 */
export function extractIds(options: ExtractIdsOptions): Observable<ExtractionProgress> {
  return new Observable<ExtractionProgress>((subscriber) => {
    void (async () => {
      const resultsPath = path.join(options.resultsDir, EXTRACTION_RESULTS_FILE);
      try {
        fs.mkdirSync(options.resultsDir, { recursive: true });
        const extractor = createIdExtractor({
          ...options,
          logFile: options.logFile ?? path.join(options.resultsDir, LLM_LOG_FILE),
        });

        let imageCount = 0;
        let report: ExtractionReport;
        try {
          report = await extractor.extract(options.inputDir, (phase, count) => {
            imageCount = count;
            subscriber.next({ phase, imageCount: count });
          });
        } catch (err) {
          if (err instanceof NetworkError) {
            fs.writeFileSync(resultsPath, formatExtractionFailure(imageCount, err.message));
          }
          throw err;
        }

        fs.writeFileSync(resultsPath, formatExtractionReport(report));
        subscriber.next({ phase: "done", imageCount: report.imageFiles.length, report });
        subscriber.complete();
      } catch (err) {
        subscriber.error(err);
      }
    })();
  });
}
