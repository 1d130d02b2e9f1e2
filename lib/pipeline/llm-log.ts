import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { ChatMessage, TokenUsage } from "./core/types";

export interface LlmLogEntry {
  timestamp: string;
  taskType: string;
  modelId: string;
  imageCount: number;
  durationMs: number;
  status: "ok" | "parse-error" | "network-error";
  usage?: TokenUsage;
  error?: string;
  messages: LlmLogMessage[];
}

export type LlmLogMessage = {
  role: string;
  content: (LlmLogTextPart | LlmLogImagePlaceholder)[];
};

type LlmLogTextPart = { type: "text"; text: string };
export type LlmLogImagePlaceholder = {
  type: "image";
  mediaType: string;
  hash: string;
  byteLength: number;
};

/**
 * Strip base64 image data from request messages, replacing each image with
 * a placeholder that records its media type, hash and decoded byte length.
 */
export function sanitizeMessages(messages: readonly ChatMessage[]): LlmLogMessage[] {
  return messages.map((m) => ({
    role: m.role,
    content: m.content.map((part) => {
      if (part.type === "text") {
        return { type: "text" as const, text: part.text };
      }
      const { mediaType, data } = splitDataUri(part.image_url.url);
      return {
        type: "image" as const,
        mediaType,
        hash: hashBase64(data),
        byteLength: Buffer.byteLength(data, "base64"),
      };
    }),
  }));
}

export function hashBase64(base64: string): string {
  return createHash("sha256").update(base64).digest("hex").slice(0, 16);
}

function splitDataUri(uri: string): { mediaType: string; data: string } {
  const match = /^data:([^;,]+);base64,(.*)$/s.exec(uri);
  if (!match) return { mediaType: "unknown", data: uri };
  return { mediaType: match[1], data: match[2] };
}

const MAX_LOG_ENTRIES = 250;

/**
 * Append a log entry to a JSONL log file, keeping at most
 * MAX_LOG_ENTRIES entries (oldest are dropped).
 */
export function appendLogEntry(filePath: string, entry: LlmLogEntry): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

  // Trim if over limit
  const content = fs.readFileSync(filePath, "utf-8");
  const lines = content.split("\n").filter(Boolean);
  if (lines.length > MAX_LOG_ENTRIES) {
    fs.writeFileSync(filePath, lines.slice(lines.length - MAX_LOG_ENTRIES).join("\n") + "\n");
  }
}

export function readLogEntries(filePath: string): LlmLogEntry[] {
  if (!fs.existsSync(filePath)) return [];
  return fs
    .readFileSync(filePath, "utf-8")
    .split("\n")
    .filter(Boolean)
    .map((line): LlmLogEntry => JSON.parse(line));
}
