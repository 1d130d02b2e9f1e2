/**
 * Core types for the extraction request/response contract.
 *
 * These mirror the OpenAI-style chat completion wire format the inference
 * endpoint speaks. They are independent of the transport used to send them.
 */

// ============================================================================
// Request
// ============================================================================

export type ContentBlock = TextBlock | ImageUrlBlock;

export interface TextBlock {
  readonly type: "text";
  readonly text: string;
}

export interface ImageUrlBlock {
  readonly type: "image_url";
  readonly image_url: { readonly url: string }; // data URI
}

export interface ChatMessage {
  readonly role: "user";
  readonly content: readonly ContentBlock[];
}

export interface SamplingParams {
  maxTokens: number;
  topP: number;
  topK: number;
  presencePenalty: number;
  frequencyPenalty: number;
  temperature: number;
}

export interface ChatCompletionRequest {
  readonly model: string;
  readonly max_tokens: number;
  readonly top_p: number;
  readonly top_k: number;
  readonly presence_penalty: number;
  readonly frequency_penalty: number;
  readonly temperature: number;
  readonly messages: readonly ChatMessage[];
}

// ============================================================================
// Transport - the only thing that touches the network
// ============================================================================

export interface ChatTransport {
  /** Resolves with the raw response body of a successful call. */
  send(request: ChatCompletionRequest): Promise<string>;
}

// ============================================================================
// Response
// ============================================================================

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export const ZERO_USAGE: Readonly<TokenUsage> = Object.freeze({
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0,
});
