import { ParseError } from "../../errors";
import {
  MISSING_VALUE,
  completionEnvelopeSchema,
  replySchema,
  toFieldValue,
  type IdentityField,
  type IdentityRecord,
  type ReplyItem,
} from "../core/schemas";
import type { TokenUsage } from "../core/types";

const FENCE = "```";
const PASSPORT_DIGITS = 9;

export const NOT_JSON_ENVELOPE = "Error: Unable to parse response as JSON.";
export const NO_CONTENT = "No valid content found in the response.";
export const NOT_JSON_REPLY = "The assistant response was not valid JSON.";

export interface ParsedCompletion {
  records: IdentityRecord[];
  usage: TokenUsage;
  /** Set when the reply could not be turned into records. */
  parseError?: ParseError;
}

/**
 * Remove a fenced code block wrapper (```json ... ```). Only strips when the
 * text both opens and closes with a fence; the opening line may carry a
 * language tag, so whole first and last lines are dropped.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!(trimmed.startsWith(FENCE) && trimmed.endsWith(FENCE))) {
    return trimmed;
  }
  const lines = trimmed.split(/\r?\n/);
  return lines.slice(1, -1).join("\n").trim();
}

const NUMBER_TOKEN = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

/**
 * Quote bare integers too large for a double, so ID numbers the model sends
 * unquoted keep every digit through JSON.parse. String contents are left as
 * they are.
 */
export function quoteUnsafeIntegers(text: string): string {
  let out = "";
  let inString = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      out += ch;
      if (ch === "\\") {
        out += text.charAt(i + 1);
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
      out += ch;
      continue;
    }
    if (ch === "-" || (ch >= "0" && ch <= "9")) {
      NUMBER_TOKEN.lastIndex = i;
      const match = NUMBER_TOKEN.exec(text);
      if (match) {
        const token = match[0];
        const unsafe = /^-?\d+$/.test(token) && !Number.isSafeInteger(Number(token));
        out += unsafe ? `"${token}"` : token;
        i += token.length - 1;
        continue;
      }
    }
    out += ch;
  }
  return out;
}

/** Keep the first nine digits of a passport number, dropping everything else. */
export function normalizePassportNumber(raw: string): string {
  return raw.replace(/\D/g, "").slice(0, PASSPORT_DIGITS);
}

export function toIdentityRecord(item: ReplyItem): IdentityRecord {
  const source: ReplyItem = { ...item };
  // Older prompts asked for "place of birth" with a space
  if (source.place_of_birth === undefined && "place of birth" in source) {
    source.place_of_birth = source["place of birth"];
  }

  const value = (field: IdentityField) => toFieldValue(source[field]);
  const record: IdentityRecord = {
    ...(typeof source.filename === "string" ? { filename: source.filename } : {}),
    id_type: value("id_type"),
    id_number: value("id_number"),
    first_name: value("first_name"),
    last_name: value("last_name"),
    dob: value("dob"),
    place_of_birth: value("place_of_birth"),
    address: value("address"),
    state: value("state"),
    country: value("country"),
    class: value("class"),
    sex: value("sex"),
    hgt: value("hgt"),
    wgt: value("wgt"),
    hair: value("hair"),
    eyes: value("eyes"),
    issue_date_iss: value("issue_date_iss"),
    expiration_date_exp: value("expiration_date_exp"),
  };

  if (record.id_type === "passport") {
    const digits = normalizePassportNumber(record.id_number);
    record.id_number = digits === "" ? MISSING_VALUE : digits;
  }
  return record;
}

/**
 * Parse the assistant's message content into identity records.
 * Throws ParseError when the content is not a JSON array of objects.
 */
export function parseExtractionReply(content: string): IdentityRecord[] {
  const text = stripCodeFence(content);
  let json: unknown;
  try {
    json = JSON.parse(quoteUnsafeIntegers(text));
  } catch {
    throw new ParseError(NOT_JSON_REPLY, content);
  }
  const result = replySchema.safeParse(json);
  if (!result.success) {
    throw new ParseError(NOT_JSON_REPLY, content);
  }
  return result.data.map(toIdentityRecord);
}

/**
 * Turn a raw chat completion body into records and token usage.
 * Problems with the reply come back as `parseError` instead of throwing.
 */
export function parseCompletionResponse(body: string): ParsedCompletion {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return {
      records: [],
      usage: readUsage(undefined),
      parseError: new ParseError(NOT_JSON_ENVELOPE, body),
    };
  }

  const envelope = completionEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    return {
      records: [],
      usage: readUsage(undefined),
      parseError: new ParseError(NO_CONTENT, body),
    };
  }

  const usage = readUsage(envelope.data.usage);
  const content = envelope.data.choices?.[0]?.message?.content;
  if (content == null) {
    return { records: [], usage, parseError: new ParseError(NO_CONTENT, body) };
  }

  try {
    return { records: parseExtractionReply(content), usage };
  } catch (err) {
    if (err instanceof ParseError) {
      return { records: [], usage, parseError: err };
    }
    throw err;
  }
}

function readUsage(
  usage:
    | { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number }
    | null
    | undefined
): TokenUsage {
  return {
    promptTokens: usage?.prompt_tokens ?? 0,
    completionTokens: usage?.completion_tokens ?? 0,
    totalTokens: usage?.total_tokens ?? 0,
  };
}
