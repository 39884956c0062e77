import type { WireMessage } from "../chat-types.js";

export type UpstreamCompletionRequest = {
  baseUrl: string;
  apiKey: string;
  model: string;
  messages: WireMessage[];
  signal: AbortSignal;
};

/**
 * Opens a streaming chat completion against an OpenAI-compatible endpoint.
 * Each yielded value is the provider's native chunk object and is forwarded verbatim.
 */
export interface UpstreamChatProvider {
  openStream(request: UpstreamCompletionRequest): Promise<AsyncIterable<unknown>>;
}
