import type { ChatRequestPayload, StreamChunk } from "../chat-types.js";
import { isRecord } from "../core/values.js";
import { ChatError, errorMessage, isChatError } from "../errors.js";
import { decodeChatStream, type MalformedChunkPolicy } from "../stream/sse-decoder.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type StreamChatOptions = {
  accessToken?: string;
  signal?: AbortSignal;
};

export interface ChatTransport {
  streamChat(payload: ChatRequestPayload, options?: StreamChatOptions): AsyncIterable<StreamChunk>;
}

export type ChatServiceOptions = {
  functionUrl: string;
  anonKey: string;
  fetch?: FetchLike;
  malformedChunks?: MalformedChunkPolicy;
  log?: (message: string) => void;
};

export class ChatService implements ChatTransport {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ChatServiceOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async *streamChat(payload: ChatRequestPayload, options: StreamChatOptions = {}): AsyncGenerator<StreamChunk> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "text/event-stream",
      apikey: this.options.anonKey,
    };
    if (options.accessToken) {
      headers.Authorization = `Bearer ${options.accessToken}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.options.functionUrl, {
        method: "POST",
        headers,
        body: JSON.stringify(payload),
        signal: options.signal,
      });
    } catch (error) {
      throw toTransportError(error, options.signal);
    }

    if (!response.ok) {
      throw await toHttpError(response);
    }
    if (!response.body) {
      throw new ChatError("invalid_response", "response has no body");
    }

    const log = this.options.log;
    try {
      yield* decodeChatStream(readBody(response.body), {
        requireDone: true,
        malformedChunks: this.options.malformedChunks,
        onSkip: log ? (payloadText, error) => log(`skipped stream chunk (${error.message}): ${payloadText}`) : undefined,
      });
    } catch (error) {
      throw toTransportError(error, options.signal);
    }
  }
}

/** Yields the body bytes; leaving the loop early cancels the underlying response stream. */
export async function* readBody(body: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let drained = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        drained = true;
        return;
      }
      yield value;
    }
  } catch (error) {
    drained = true;
    throw error;
  } finally {
    if (drained) {
      reader.releaseLock();
    } else {
      await reader.cancel();
    }
  }
}

function toTransportError(error: unknown, signal: AbortSignal | undefined): ChatError {
  if (isChatError(error)) {
    return error;
  }
  if (signal?.aborted) {
    return new ChatError("cancelled", "request cancelled");
  }
  return new ChatError("network_error", `network request failed: ${errorMessage(error)}`);
}

async function toHttpError(response: Response): Promise<ChatError> {
  const text = await response.text().catch((error: unknown) => errorMessage(error));
  const message = readErrorMessage(text) ?? (text.trim() || `HTTP ${response.status}`);
  const data = { status: response.status, body: text };
  switch (response.status) {
    case 401:
      return new ChatError("unauthorized", message, { status: 401, data });
    case 404:
      return new ChatError("model_not_available", message, { status: 404, data });
    default:
      return new ChatError("http_error", message, { status: response.status, data });
  }
}

function readErrorMessage(text: string): string | null {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed) && isRecord(parsed.error) && typeof parsed.error.message === "string") {
      return parsed.error.message;
    }
  } catch {
    return null;
  }
  return null;
}
