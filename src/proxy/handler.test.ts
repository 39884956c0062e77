import { describe, expect, it, vi } from "vitest";
import type { UsageLogEntry } from "../chat-types.js";
import type { ResolvedModelConfig } from "../models/registry.js";
import { createChatProxyHandler, type ChatProxyDeps } from "./handler.js";
import type { UpstreamCompletionRequest } from "./upstream.js";

const GPT_X: ResolvedModelConfig = {
  modelIdentifier: "gpt-x",
  displayName: "GPT X",
  baseUrl: "https://llm.example.com/v1",
  systemPrompt: "you help with shift rosters.",
  apiSecretName: "GPT_X_KEY",
};

const HELLO_CHUNKS = [
  { choices: [{ delta: { content: "He" } }] },
  { choices: [{ delta: { content: "llo" }, finish_reason: "stop" }], usage: { total_tokens: 5 } },
];

async function* emit(chunks: unknown[]): AsyncGenerator<unknown> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

function buildDeps(overrides: Partial<ChatProxyDeps> = {}) {
  const rows: UsageLogEntry[] = [];
  const logs: string[] = [];
  const upstreamRequests: UpstreamCompletionRequest[] = [];
  let clock = 1_000;

  const deps: ChatProxyDeps = {
    auth: {
      verify: async (header) => (header === "Bearer test-token" ? { id: "user-1" } : null),
    },
    models: {
      findActiveConfig: async (modelIdentifier) => (modelIdentifier === "gpt-x" ? GPT_X : null),
    },
    upstream: {
      openStream: async (request) => {
        upstreamRequests.push(request);
        return emit(HELLO_CHUNKS);
      },
    },
    usageLog: {
      insert: async (entry) => {
        rows.push(entry);
      },
    },
    getSecret: (name) => (name === "GPT_X_KEY" ? "test-secret" : undefined),
    now: () => {
      clock += 10;
      return clock;
    },
    log: (message) => logs.push(message),
    ...overrides,
  };

  return { deps, rows, logs, upstreamRequests };
}

function chatRequest(body: unknown, headers: Record<string, string> = { Authorization: "Bearer test-token" }) {
  return new Request("http://localhost/functions/v1/ai-chat", {
    method: "POST",
    headers: { "Content-Type": "application/json", Accept: "text/event-stream", ...headers },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

const HELLO_REQUEST = {
  model_identifier: "gpt-x",
  messages: [{ role: "user", content: [{ type: "text", text: "hi" }] }],
  client_message_id: "11111111-1111-1111-1111-111111111111",
  attachments: [],
};

describe("chat proxy handler", () => {
  it("answers preflight with cors headers and no body", async () => {
    const { deps } = buildDeps();
    const response = await createChatProxyHandler(deps)(
      new Request("http://localhost/functions/v1/ai-chat", { method: "OPTIONS" }),
    );

    expect(response.status).toBe(200);
    expect(response.body).toBeNull();
    expect(response.headers.get("access-control-allow-origin")).toBe("*");
    expect(response.headers.get("access-control-allow-headers")).toContain("apikey");
  });

  it("rejects missing credentials without logging usage", async () => {
    const openStream = vi.fn();
    const { deps, rows } = buildDeps({ upstream: { openStream } });
    const response = await createChatProxyHandler(deps)(chatRequest(HELLO_REQUEST, {}));

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ error: { code: "unauthorized", message: "unauthorized" } });
    expect(openStream).not.toHaveBeenCalled();
    expect(rows).toEqual([]);
  });

  it("treats a failing identity service as unauthorized", async () => {
    const { deps, logs } = buildDeps({
      auth: {
        verify: async () => {
          throw new Error("auth service down");
        },
      },
    });
    const response = await createChatProxyHandler(deps)(chatRequest(HELLO_REQUEST));

    expect(response.status).toBe(401);
    expect(logs).toEqual(["auth verification failed: auth service down"]);
  });

  it("rejects bodies that are not json", async () => {
    const { deps } = buildDeps();
    const response = await createChatProxyHandler(deps)(chatRequest("{nope"));

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: { code: "invalid_request" } });
  });

  it("returns 404 for unknown models and writes no usage row by default", async () => {
    const { deps, rows } = buildDeps();
    const response = await createChatProxyHandler(deps)(
      chatRequest({ ...HELLO_REQUEST, model_identifier: "retired-model" }),
    );

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: { code: "model_not_available", message: "model not available" },
    });
    expect(rows).toEqual([]);
  });

  it("logs rejected requests when configured to", async () => {
    const { deps, rows } = buildDeps({ logRejectedRequests: true });
    const response = await createChatProxyHandler(deps)(
      chatRequest({ ...HELLO_REQUEST, model_identifier: "retired-model" }),
    );

    expect(response.status).toBe(404);
    expect(rows).toEqual([
      {
        user_id: "user-1",
        model_identifier: "retired-model",
        request_id: "11111111-1111-1111-1111-111111111111",
        status: "error",
        prompt_tokens: null,
        completion_tokens: null,
        total_tokens: null,
        error_code: "model_not_available",
        error_message: "model not available",
        latency_ms: 10,
      },
    ]);
  });

  it("returns 500 when the provider secret is missing", async () => {
    const { deps, rows, logs } = buildDeps({ getSecret: () => undefined });
    const response = await createChatProxyHandler(deps)(chatRequest(HELLO_REQUEST));

    expect(response.status).toBe(500);
    expect(rows).toEqual([]);
    expect(logs).toEqual(["missing secret: GPT_X_KEY"]);
  });

  it("streams provider chunks verbatim and logs a success row", async () => {
    const { deps, rows, upstreamRequests } = buildDeps();
    const response = await createChatProxyHandler(deps)(chatRequest(HELLO_REQUEST));

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/event-stream");
    expect(response.headers.get("cache-control")).toBe("no-store");

    const text = await response.text();
    expect(text).toBe(
      [
        'data: {"choices":[{"delta":{"content":"He"}}]}',
        "",
        'data: {"choices":[{"delta":{"content":"llo"},"finish_reason":"stop"}],"usage":{"total_tokens":5}}',
        "",
        "data: [DONE]",
        "",
        "",
      ].join("\n"),
    );

    expect(upstreamRequests).toHaveLength(1);
    expect(upstreamRequests[0]).toMatchObject({
      baseUrl: "https://llm.example.com/v1",
      apiKey: "test-secret",
      model: "gpt-x",
      messages: [
        { role: "system", content: "you help with shift rosters." },
        { role: "user", content: [{ type: "text", text: "hi" }] },
      ],
    });

    expect(rows).toEqual([
      {
        user_id: "user-1",
        model_identifier: "gpt-x",
        request_id: "11111111-1111-1111-1111-111111111111",
        status: "success",
        prompt_tokens: null,
        completion_tokens: null,
        total_tokens: 5,
        error_code: null,
        error_message: null,
        latency_ms: 10,
      },
    ]);
  });

  it("terminates the stream and logs an error row when the provider fails mid-stream", async () => {
    async function* failing(): AsyncGenerator<unknown> {
      yield HELLO_CHUNKS[0];
      throw Object.assign(new Error("upstream reset"), { code: "ECONNRESET" });
    }
    const { deps, rows } = buildDeps({ upstream: { openStream: async () => failing() } });
    const response = await createChatProxyHandler(deps)(chatRequest(HELLO_REQUEST));

    expect(response.status).toBe(200);
    await expect(response.text()).rejects.toThrow("upstream reset");
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      status: "error",
      error_code: "ECONNRESET",
      error_message: "upstream reset",
      total_tokens: null,
      latency_ms: 10,
    });
  });

  it("logs a cancelled row and aborts upstream when the client disconnects", async () => {
    let upstreamSignal: AbortSignal | undefined;
    async function* hanging(signal: AbortSignal): AsyncGenerator<unknown> {
      yield HELLO_CHUNKS[0];
      await new Promise<never>((_, reject) => {
        signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    }
    const { deps, rows } = buildDeps({
      upstream: {
        openStream: async (request) => {
          upstreamSignal = request.signal;
          return hanging(request.signal);
        },
      },
    });
    const response = await createChatProxyHandler(deps)(chatRequest(HELLO_REQUEST));
    const body = response.body;
    if (!body) {
      throw new Error("expected a streaming body");
    }

    const reader = body.getReader();
    const first = await reader.read();
    expect(new TextDecoder().decode(first.value)).toBe('data: {"choices":[{"delta":{"content":"He"}}]}\n\n');
    await reader.cancel();

    expect(upstreamSignal?.aborted).toBe(true);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ status: "cancelled", total_tokens: null, error_code: null, latency_ms: 10 });
  });

  it("answers 502 and logs an error row when the upstream call cannot be opened", async () => {
    const { deps, rows } = buildDeps({
      upstream: {
        openStream: async () => {
          throw Object.assign(new Error("invalid api key"), { status: 401 });
        },
      },
    });
    const response = await createChatProxyHandler(deps)(chatRequest(HELLO_REQUEST));

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({
      error: { code: "upstream_error", message: "upstream request failed: invalid api key" },
    });
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ status: "error", error_code: "401", error_message: "invalid api key" });
  });

  it("keeps streaming when the usage log write fails", async () => {
    const { deps, logs } = buildDeps({
      usageLog: {
        insert: async () => {
          throw new Error("table missing");
        },
      },
    });
    const response = await createChatProxyHandler(deps)(chatRequest(HELLO_REQUEST));

    expect(await response.text()).toContain("data: [DONE]");
    await vi.waitFor(() => {
      expect(logs).toContain(
        "usage log write failed (success, request 11111111-1111-1111-1111-111111111111): table missing",
      );
    });
  });
});
