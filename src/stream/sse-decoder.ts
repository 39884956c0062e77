import type { StreamChunk, UsageMetrics } from "../chat-types.js";
import { isRecord, readOptionalCount } from "../core/values.js";
import { ChatError } from "../errors.js";

export type MalformedChunkPolicy = "fail" | "skip";

export type DecodeChatStreamOptions = {
  /** What to do with a `data:` payload that is not a JSON object. */
  malformedChunks?: MalformedChunkPolicy;
  /** Treat end of input without the `[DONE]` sentinel as a truncated stream. */
  requireDone?: boolean;
  onSkip?: (payload: string, error: Error) => void;
};

export const SSE_DONE_SENTINEL = "[DONE]";
export const SSE_DONE_LINE = `data: ${SSE_DONE_SENTINEL}\n\n`;

const DATA_PREFIX = "data:";

export function encodeSseData(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export async function* splitSseLines(source: AsyncIterable<Uint8Array | string>): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buffer = "";

  for await (const part of source) {
    buffer += typeof part === "string" ? part : decoder.decode(part, { stream: true });
    let newlineIndex = buffer.indexOf("\n");
    while (newlineIndex !== -1) {
      yield stripCarriageReturn(buffer.slice(0, newlineIndex));
      buffer = buffer.slice(newlineIndex + 1);
      newlineIndex = buffer.indexOf("\n");
    }
  }

  buffer += decoder.decode();
  if (buffer) {
    yield stripCarriageReturn(buffer);
  }
}

export async function* decodeChatStream(
  source: AsyncIterable<Uint8Array | string>,
  options: DecodeChatStreamOptions = {},
): AsyncGenerator<StreamChunk> {
  const policy = options.malformedChunks ?? "fail";

  for await (const line of splitSseLines(source)) {
    if (!line.startsWith(DATA_PREFIX)) {
      continue;
    }
    const payload = line.slice(DATA_PREFIX.length).trim();
    if (payload === SSE_DONE_SENTINEL) {
      return;
    }
    if (!payload) {
      continue;
    }

    const parsed = parseEnvelope(payload);
    if (!parsed.ok) {
      if (policy === "skip") {
        options.onSkip?.(payload, parsed.error);
        continue;
      }
      throw parsed.error;
    }
    yield parsed.chunk;
  }

  if (options.requireDone) {
    throw new ChatError("stream_truncated", "stream ended before completion");
  }
}

export function chunkFromEnvelope(envelope: Record<string, unknown>): StreamChunk {
  const choices = Array.isArray(envelope.choices) ? envelope.choices.filter(isRecord) : [];

  let textDelta = "";
  for (const choice of choices) {
    const delta = choice.delta;
    if (isRecord(delta) && typeof delta.content === "string") {
      textDelta += delta.content;
    }
  }

  const finishReason = choices[0]?.finish_reason;

  return {
    textDelta,
    finishReason: typeof finishReason === "string" ? finishReason : null,
    usage: readUsage(envelope.usage),
  };
}

export function readUsage(value: unknown): UsageMetrics | null {
  if (!isRecord(value)) {
    return null;
  }
  const usage: UsageMetrics = {};
  const promptTokens = readOptionalCount(value.prompt_tokens);
  const completionTokens = readOptionalCount(value.completion_tokens);
  const totalTokens = readOptionalCount(value.total_tokens);
  if (promptTokens !== undefined) {
    usage.promptTokens = promptTokens;
  }
  if (completionTokens !== undefined) {
    usage.completionTokens = completionTokens;
  }
  if (totalTokens !== undefined) {
    usage.totalTokens = totalTokens;
  }
  return usage;
}

function parseEnvelope(payload: string): { ok: true; chunk: StreamChunk } | { ok: false; error: ChatError } {
  let value: unknown;
  try {
    value = JSON.parse(payload);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      error: new ChatError("malformed_chunk", `malformed stream chunk: ${reason}`, { data: { payload } }),
    };
  }
  if (!isRecord(value)) {
    return {
      ok: false,
      error: new ChatError("malformed_chunk", "malformed stream chunk: expected a JSON object", {
        data: { payload },
      }),
    };
  }
  return { ok: true, chunk: chunkFromEnvelope(value) };
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}
