/**
 * Zod schemas for the model's reply and the response envelope around it.
 */

import { z } from "zod/v4";

export const MISSING_VALUE = "N/A";

export const IDENTITY_FIELDS = [
  "id_type",
  "id_number",
  "first_name",
  "last_name",
  "dob",
  "place_of_birth",
  "address",
  "state",
  "country",
  "class",
  "sex",
  "hgt",
  "wgt",
  "hair",
  "eyes",
  "issue_date_iss",
  "expiration_date_exp",
] as const;

export type IdentityField = (typeof IDENTITY_FIELDS)[number];

export type IdentityRecord = { filename?: string } & Record<IdentityField, string>;

// ============================================================================
// Model reply
// ============================================================================

/**
 * Models answer with strings most of the time, but numbers (heights, ids)
 * and nulls show up too. Anything blank or non-scalar becomes "N/A".
 */
export function toFieldValue(value: unknown): string {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? MISSING_VALUE : trimmed;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return MISSING_VALUE;
}

const replyItemSchema = z.record(z.string(), z.unknown());

export const replySchema = z.array(replyItemSchema);

export type ReplyItem = z.infer<typeof replyItemSchema>;

// ============================================================================
// Chat completion envelope
// ============================================================================

const tokenCount = z.number().int().min(0).optional().catch(undefined);

export const completionEnvelopeSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
          })
          .optional(),
      })
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: tokenCount,
      completion_tokens: tokenCount,
      total_tokens: tokenCount,
    })
    .nullish()
    .catch(undefined),
});
