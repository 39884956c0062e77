import { describe, expect, it } from "vitest";
import type { StreamChunk } from "../chat-types.js";
import { ChatError } from "../errors.js";
import { decodeChatStream, encodeSseData, splitSseLines, SSE_DONE_LINE } from "./sse-decoder.js";

async function* fromParts(parts: Array<string | Uint8Array>): AsyncGenerator<string | Uint8Array> {
  for (const part of parts) {
    yield part;
  }
}

async function collect(
  parts: Array<string | Uint8Array>,
  options?: Parameters<typeof decodeChatStream>[1],
): Promise<StreamChunk[]> {
  const chunks: StreamChunk[] = [];
  for await (const chunk of decodeChatStream(fromParts(parts), options)) {
    chunks.push(chunk);
  }
  return chunks;
}

describe("splitSseLines", () => {
  it("joins lines split across reads and strips carriage returns", async () => {
    const lines: string[] = [];
    for await (const line of splitSseLines(fromParts(["data: a", "bc\r\n\r\nda", "ta: x"]))) {
      lines.push(line);
    }
    expect(lines).toEqual(["data: abc", "", "data: x"]);
  });

  it("keeps multi-byte characters split between byte chunks", async () => {
    const bytes = new TextEncoder().encode("data: héllo\n");
    const lines: string[] = [];
    for await (const line of splitSseLines(fromParts([bytes.slice(0, 8), bytes.slice(8)]))) {
      lines.push(line);
    }
    expect(lines).toEqual(["data: héllo"]);
  });
});

describe("decodeChatStream", () => {
  it("stops at the done sentinel without emitting a chunk for it", async () => {
    const chunks = await collect([
      encodeSseData({ choices: [{ delta: { content: "He" } }] }),
      encodeSseData({ choices: [{ delta: { content: "llo" }, finish_reason: "stop" }], usage: { total_tokens: 5 } }),
      SSE_DONE_LINE,
      encodeSseData({ choices: [{ delta: { content: "ignored" } }] }),
    ]);

    expect(chunks).toEqual([
      { textDelta: "He", finishReason: null, usage: null },
      { textDelta: "llo", finishReason: "stop", usage: { totalTokens: 5 } },
    ]);
  });

  it("ignores comments, event names and empty data lines", async () => {
    const chunks = await collect([
      ": keep-alive\n",
      "event: message\n",
      "data:\n\n",
      "data:   \n\n",
      'data:{"choices":[{"delta":{"content":"x"}}]}\n\n',
      "data: [DONE]\n\n",
    ]);

    expect(chunks.map((chunk) => chunk.textDelta)).toEqual(["x"]);
  });

  it("concatenates content across choices and reads the first finish reason", async () => {
    const chunks = await collect([
      encodeSseData({
        choices: [
          { delta: { content: "a" }, finish_reason: "length" },
          { delta: { content: "b" }, finish_reason: "stop" },
          { delta: {} },
        ],
        usage: { prompt_tokens: 3, completion_tokens: 2 },
      }),
    ]);

    expect(chunks).toEqual([
      { textDelta: "ab", finishReason: "length", usage: { promptTokens: 3, completionTokens: 2 } },
    ]);
  });

  it("yields an empty delta for role-only chunks", async () => {
    const chunks = await collect([encodeSseData({ choices: [{ delta: { role: "assistant" } }] })]);
    expect(chunks).toEqual([{ textDelta: "", finishReason: null, usage: null }]);
  });

  it("fails with malformed_chunk and emits nothing after the bad line", async () => {
    const seen: string[] = [];
    const stream = decodeChatStream(
      fromParts([
        encodeSseData({ choices: [{ delta: { content: "ok" } }] }),
        "data: {not json\n\n",
        encodeSseData({ choices: [{ delta: { content: "later" } }] }),
      ]),
    );

    await expect(
      (async () => {
        for await (const chunk of stream) {
          seen.push(chunk.textDelta);
        }
      })(),
    ).rejects.toMatchObject({ code: "malformed_chunk" } satisfies Partial<ChatError>);
    expect(seen).toEqual(["ok"]);
  });

  it("treats a non-object payload as malformed", async () => {
    await expect(collect(["data: 42\n\n"])).rejects.toBeInstanceOf(ChatError);
  });

  it("skips malformed payloads when configured to", async () => {
    const skipped: string[] = [];
    const chunks = await collect(
      ["data: {bad\n\n", encodeSseData({ choices: [{ delta: { content: "fine" } }] }), SSE_DONE_LINE],
      {
        malformedChunks: "skip",
        onSkip: (payload) => skipped.push(payload),
      },
    );

    expect(chunks.map((chunk) => chunk.textDelta)).toEqual(["fine"]);
    expect(skipped).toEqual(["{bad"]);
  });

  it("ends quietly without the sentinel unless it is required", async () => {
    const parts = [encodeSseData({ choices: [{ delta: { content: "partial" } }] })];
    await expect(collect(parts)).resolves.toHaveLength(1);
    await expect(collect(parts, { requireDone: true })).rejects.toMatchObject({
      code: "stream_truncated",
    } satisfies Partial<ChatError>);
  });

  it("applies deltas in arrival order", async () => {
    const deltas = ["The ", "quick ", "", "brown ", "fox"];
    const chunks = await collect([
      ...deltas.map((content) => encodeSseData({ choices: [{ delta: { content } }] })),
      SSE_DONE_LINE,
    ]);
    expect(chunks.map((chunk) => chunk.textDelta).join("")).toBe("The quick brown fox");
  });
});
