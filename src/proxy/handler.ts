import type { ChatRequestPayload, UsageMetrics, WireMessage } from "../chat-types.js";
import { isRecord } from "../core/values.js";
import { CHAT_ERROR_STATUS, ChatError, errorMessage, isChatError } from "../errors.js";
import type { ModelConfigRepository, ResolvedModelConfig } from "../models/registry.js";
import { encodeSseData, readUsage, SSE_DONE_LINE } from "../stream/sse-decoder.js";
import type { AuthenticatedUser, AuthVerifier } from "./auth.js";
import { CORS_HEADERS, SSE_HEADERS } from "./cors.js";
import { parseChatRequest } from "./request.js";
import type { UpstreamChatProvider } from "./upstream.js";
import { buildUsageLogEntry, describeUpstreamError, type UsageLogInput, type UsageLogWriter } from "./usage-log.js";

export type ChatProxyDeps = {
  auth: AuthVerifier;
  models: ModelConfigRepository;
  upstream: UpstreamChatProvider;
  usageLog: UsageLogWriter;
  getSecret: (name: string) => string | undefined;
  /** Also write an `error` usage row when an authenticated request fails model or secret resolution. */
  logRejectedRequests?: boolean;
  now?: () => number;
  log?: (message: string) => void;
};

export type ChatProxyHandler = (request: Request) => Promise<Response>;

const encoder = new TextEncoder();

export function createChatProxyHandler(deps: ChatProxyDeps): ChatProxyHandler {
  const now = deps.now ?? (() => performance.now());
  const log = deps.log ?? ((message: string) => console.error(`[roster-chat] ${message}`));

  const recordUsage = async (input: UsageLogInput): Promise<void> => {
    try {
      await deps.usageLog.insert(buildUsageLogEntry(input));
    } catch (error) {
      log(`usage log write failed (${input.status}, request ${input.requestId}): ${errorMessage(error)}`);
    }
  };

  return async function handleChatRequest(request: Request): Promise<Response> {
    if (request.method === "OPTIONS") {
      return new Response(null, { status: 200, headers: CORS_HEADERS });
    }
    if (request.method !== "POST") {
      return errorResponse(new ChatError("invalid_request", "method not allowed", { status: 405 }));
    }

    const user = await authenticate(deps.auth, request, log);
    if (!user) {
      return errorResponse(
        new ChatError("unauthorized", "unauthorized", { status: CHAT_ERROR_STATUS.unauthorized }),
      );
    }

    const parsed = await readPayload(request);
    if (!parsed.ok) {
      log(`invalid request body: ${parsed.error.message}`);
      return errorResponse(parsed.error);
    }
    const payload = parsed.payload;

    const resolveStartedAt = now();
    const reject = async (failure: ChatError): Promise<Response> => {
      if (deps.logRejectedRequests) {
        await recordUsage({
          userId: user.id,
          modelIdentifier: payload.model_identifier,
          requestId: payload.client_message_id,
          status: "error",
          latencyMs: now() - resolveStartedAt,
          error: failure,
        });
      }
      return errorResponse(failure);
    };

    const config = await findConfig(deps.models, payload.model_identifier, log);
    if (!config) {
      log(`model config not found: ${payload.model_identifier}`);
      return reject(
        new ChatError("model_not_available", "model not available", {
          status: CHAT_ERROR_STATUS.model_not_available,
        }),
      );
    }

    const apiKey = deps.getSecret(config.apiSecretName)?.trim();
    if (!apiKey) {
      log(`missing secret: ${config.apiSecretName}`);
      return reject(
        new ChatError("secret_missing", "model secret not configured", {
          status: CHAT_ERROR_STATUS.secret_missing,
        }),
      );
    }

    const usageBase = {
      userId: user.id,
      modelIdentifier: payload.model_identifier,
      requestId: payload.client_message_id,
    };
    const abort = new AbortController();
    const startTime = now();

    let upstream: AsyncIterable<unknown>;
    try {
      upstream = await deps.upstream.openStream({
        baseUrl: config.baseUrl,
        apiKey,
        model: config.modelIdentifier,
        messages: withSystemPrompt(config, payload.messages),
        signal: abort.signal,
      });
    } catch (error) {
      const failure = describeUpstreamError(error);
      log(`upstream request failed: ${failure.message}`);
      await recordUsage({ ...usageBase, status: "error", latencyMs: now() - startTime, error });
      return errorResponse(
        new ChatError("upstream_error", `upstream request failed: ${failure.message}`, {
          status: CHAT_ERROR_STATUS.upstream_error,
        }),
      );
    }

    const iterator = upstream[Symbol.asyncIterator]();
    let latestUsage: UsageMetrics | null = null;
    let settled = false;

    const settle = async (input: Pick<UsageLogInput, "status" | "usage" | "error">): Promise<void> => {
      if (settled) {
        return;
      }
      settled = true;
      await recordUsage({ ...usageBase, ...input, latencyMs: now() - startTime });
    };

    const body = new ReadableStream<Uint8Array>({
      async pull(controller) {
        let next: IteratorResult<unknown>;
        try {
          next = await iterator.next();
        } catch (error) {
          if (settled) {
            return;
          }
          log(`streaming error: ${describeUpstreamError(error).message}`);
          controller.error(error);
          await settle({ status: "error", error });
          return;
        }
        if (settled) {
          return;
        }

        if (next.done) {
          controller.enqueue(encoder.encode(SSE_DONE_LINE));
          controller.close();
          await settle({ status: "success", usage: latestUsage });
          return;
        }

        const usage = isRecord(next.value) ? readUsage(next.value.usage) : null;
        if (usage) {
          latestUsage = usage;
        }
        controller.enqueue(encoder.encode(encodeSseData(next.value)));
      },
      async cancel() {
        if (settled) {
          return;
        }
        abort.abort();
        await settle({ status: "cancelled" });
      },
    });

    return new Response(body, { status: 200, headers: SSE_HEADERS });
  };
}

export function withSystemPrompt(config: ResolvedModelConfig, messages: WireMessage[]): WireMessage[] {
  if (!config.systemPrompt.trim()) {
    return messages;
  }
  return [{ role: "system", content: config.systemPrompt }, ...messages];
}

export function errorResponse(error: ChatError): Response {
  return new Response(JSON.stringify({ error: { code: error.code, message: error.message } }), {
    status: error.status ?? 500,
    headers: {
      ...CORS_HEADERS,
      "Content-Type": "application/json",
    },
  });
}

async function readPayload(
  request: Request,
): Promise<{ ok: true; payload: ChatRequestPayload } | { ok: false; error: ChatError }> {
  try {
    return { ok: true, payload: parseChatRequest(await request.json()) };
  } catch (error) {
    const failure = isChatError(error)
      ? error
      : new ChatError("invalid_request", `invalid request: body must be JSON (${errorMessage(error)})`);
    failure.status = CHAT_ERROR_STATUS.invalid_request;
    return { ok: false, error: failure };
  }
}

async function authenticate(
  auth: AuthVerifier,
  request: Request,
  log: (message: string) => void,
): Promise<AuthenticatedUser | null> {
  try {
    return await auth.verify(request.headers.get("Authorization"));
  } catch (error) {
    log(`auth verification failed: ${errorMessage(error)}`);
    return null;
  }
}

async function findConfig(
  models: ModelConfigRepository,
  modelIdentifier: string,
  log: (message: string) => void,
): Promise<ResolvedModelConfig | null> {
  try {
    return await models.findActiveConfig(modelIdentifier);
  } catch (error) {
    log(`model config lookup failed: ${errorMessage(error)}`);
    return null;
  }
}
