import type { SupabaseClient } from "@supabase/supabase-js";
import type { UsageLogEntry, UsageLogStatus, UsageMetrics } from "../chat-types.js";
import { isRecord } from "../core/values.js";

export const USAGE_LOG_TABLE = "ai_usage_logs";

export interface UsageLogWriter {
  insert(entry: UsageLogEntry): Promise<void>;
}

export type UsageLogInput = {
  userId: string;
  modelIdentifier: string;
  requestId: string;
  status: UsageLogStatus;
  latencyMs: number;
  usage?: UsageMetrics | null;
  error?: unknown;
};

export function buildUsageLogEntry(input: UsageLogInput): UsageLogEntry {
  const failure = input.error === undefined ? null : describeUpstreamError(input.error);
  return {
    user_id: input.userId,
    model_identifier: input.modelIdentifier,
    request_id: input.requestId,
    status: input.status,
    prompt_tokens: input.usage?.promptTokens ?? null,
    completion_tokens: input.usage?.completionTokens ?? null,
    total_tokens: input.usage?.totalTokens ?? null,
    error_code: failure?.code ?? null,
    error_message: failure?.message ?? null,
    latency_ms: Math.max(0, Math.round(input.latencyMs)),
  };
}

/** Provider SDK errors carry a string `code` or a numeric HTTP `status`; either becomes the logged code. */
export function describeUpstreamError(error: unknown): { code: string | null; message: string } {
  if (!isRecord(error)) {
    return { code: null, message: String(error) };
  }
  const rawCode = error.code;
  const rawStatus = error.status;
  let code: string | null = null;
  if (typeof rawCode === "string" && rawCode.trim()) {
    code = rawCode.trim();
  } else if (typeof rawCode === "number" && Number.isFinite(rawCode)) {
    code = String(rawCode);
  } else if (typeof rawStatus === "number" && Number.isFinite(rawStatus)) {
    code = String(rawStatus);
  }
  const message =
    error instanceof Error ? error.message : typeof error.message === "string" ? error.message : String(error);
  return { code, message };
}

export class SupabaseUsageLogWriter implements UsageLogWriter {
  constructor(private readonly client: SupabaseClient) {}

  async insert(entry: UsageLogEntry): Promise<void> {
    const { error } = await this.client.from(USAGE_LOG_TABLE).insert(entry);
    if (error) {
      throw new Error(`usage log insert failed: ${error.message}`);
    }
  }
}
