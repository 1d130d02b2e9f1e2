/**
 * HTTP transport for the inference endpoint.
 *
 * Sends one chat completion request and hands back the raw body. No timeout
 * and no retries: a hung or failed call ends the run.
 */

import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { NetworkError } from "../../errors";
import type { ChatCompletionRequest, ChatTransport } from "./types";

export interface CreateHttpTransportOptions {
  endpoint: string;
  apiKey: string;
  /** Preconfigured client; tests pass one with an in-process adapter. */
  client?: AxiosInstance;
}

export function createHttpTransport(
  options: CreateHttpTransportOptions
): ChatTransport {
  const client = options.client ?? axios.create();

  return {
    async send(request: ChatCompletionRequest): Promise<string> {
      let response: AxiosResponse<string>;
      try {
        response = await client.post<string>(options.endpoint, request, {
          headers: {
            Accept: "application/json",
            "Content-Type": "application/json",
            Authorization: `Bearer ${options.apiKey}`,
          },
          responseType: "text",
          // Keep the body as-is; parsing belongs to the response parser
          transformResponse: (data: unknown) => data,
          validateStatus: () => true,
          maxBodyLength: Infinity,
          maxContentLength: Infinity,
        });
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new NetworkError(
          `Request to ${options.endpoint} failed: ${reason}`,
          undefined,
          undefined,
          { cause: err }
        );
      }

      const body = String(response.data ?? "");
      if (response.status !== 200) {
        throw new NetworkError(`Error ${response.status}: ${body}`, response.status, body);
      }
      return body;
    },
  };
}
