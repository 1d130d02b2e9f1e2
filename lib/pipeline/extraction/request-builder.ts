import { ConfigurationError } from "../../errors";
import { toDataUri } from "../images";
import type {
  ChatCompletionRequest,
  ContentBlock,
  SamplingParams,
} from "../core/types";

export interface ImageEntry {
  fileName: string;
  bytes: Buffer;
  caption: string;
}

/**
 * Accumulates the content of the single extraction request: one instruction
 * block, then an image block and its caption for every image, in the order
 * they were added.
 */
export class ExtractionRequestBuilder {
  private readonly blocks: ContentBlock[];
  private imageCount = 0;

  constructor(instructions: string) {
    this.blocks = [{ type: "text", text: instructions }];
  }

  addImage(entry: ImageEntry): this {
    this.blocks.push({
      type: "image_url",
      image_url: { url: toDataUri(entry.fileName, entry.bytes) },
    });
    this.blocks.push({ type: "text", text: entry.caption });
    this.imageCount++;
    return this;
  }

  get size(): number {
    return this.imageCount;
  }

  build(options: { model: string; sampling: SamplingParams }): ChatCompletionRequest {
    if (this.imageCount === 0) {
      throw new ConfigurationError("Cannot build an extraction request without images.");
    }
    const { model, sampling } = options;
    const request: ChatCompletionRequest = {
      model,
      max_tokens: sampling.maxTokens,
      top_p: sampling.topP,
      top_k: sampling.topK,
      presence_penalty: sampling.presencePenalty,
      frequency_penalty: sampling.frequencyPenalty,
      temperature: sampling.temperature,
      messages: [
        {
          role: "user",
          content: this.blocks.map((b) =>
            b.type === "text"
              ? { type: b.type, text: b.text }
              : { type: b.type, image_url: { url: b.image_url.url } }
          ),
        },
      ],
    };
    return deepFreeze(request);
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
