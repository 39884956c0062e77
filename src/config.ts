import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { config as loadDotEnv } from "dotenv";
import type { MalformedChunkPolicy } from "./stream/sse-decoder.js";

const localEnvPath = path.resolve(process.cwd(), ".env.local");
if (fs.existsSync(localEnvPath)) {
  loadDotEnv({ path: localEnvPath, quiet: true });
}
loadDotEnv({ quiet: true });

export type EnvRecord = Record<string, string | undefined>;

export type ServerConfig = {
  supabaseUrl: string;
  anonKey: string;
  serviceRoleKey: string;
  host: string;
  port: number;
  logRejectedRequests: boolean;
};

export type ClientConfig = {
  supabaseUrl: string;
  anonKey: string;
  functionUrl: string;
  accessToken: string | undefined;
  contextUserTurns: number;
  dataDir: string;
  malformedChunks: MalformedChunkPolicy;
  uploadBucket: string;
};

export const DEFAULT_PORT = 8787;
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_CONTEXT_USER_TURNS = 6;
export const DEFAULT_UPLOAD_BUCKET = "ai-chat-uploads";
export const EDGE_FUNCTION_PATH = "functions/v1/ai-chat";

export function loadServerConfig(env: EnvRecord = process.env): ServerConfig {
  const supabaseUrl = readTrimmed(env.SUPABASE_URL);
  const anonKey = readTrimmed(env.SUPABASE_ANON_KEY);
  const serviceRoleKey = readTrimmed(env.SERVICE_ROLE_KEY) || readTrimmed(env.SUPABASE_SERVICE_ROLE_KEY);
  if (!supabaseUrl || !anonKey || !serviceRoleKey) {
    throw new Error(
      "Supabase credentials missing. Set SUPABASE_URL, SUPABASE_ANON_KEY and SERVICE_ROLE_KEY.",
    );
  }

  return {
    supabaseUrl,
    anonKey,
    serviceRoleKey,
    host: readTrimmed(env.ROSTER_CHAT_HOST) || DEFAULT_HOST,
    port: parsePositiveInt(env.ROSTER_CHAT_PORT, "ROSTER_CHAT_PORT", DEFAULT_PORT),
    logRejectedRequests: parseBoolean(env.ROSTER_CHAT_LOG_REJECTED, "ROSTER_CHAT_LOG_REJECTED", false),
  };
}

export function loadClientConfig(env: EnvRecord = process.env): ClientConfig {
  const supabaseUrl = readTrimmed(env.SUPABASE_URL);
  const anonKey = readTrimmed(env.SUPABASE_ANON_KEY);
  if (!supabaseUrl || !anonKey) {
    throw new Error("Supabase credentials missing. Set SUPABASE_URL and SUPABASE_ANON_KEY.");
  }

  const functionUrl =
    readTrimmed(env.ROSTER_CHAT_FUNCTION_URL) || `${supabaseUrl.replace(/\/+$/, "")}/${EDGE_FUNCTION_PATH}`;

  return {
    supabaseUrl,
    anonKey,
    functionUrl,
    accessToken: readTrimmed(env.ROSTER_CHAT_ACCESS_TOKEN) || undefined,
    contextUserTurns: parsePositiveInt(
      env.ROSTER_CHAT_CONTEXT_TURNS,
      "ROSTER_CHAT_CONTEXT_TURNS",
      DEFAULT_CONTEXT_USER_TURNS,
    ),
    dataDir: readTrimmed(env.ROSTER_CHAT_DATA_DIR) || path.join(os.homedir(), ".roster-chat"),
    malformedChunks: parseMalformedChunkPolicy(env.ROSTER_CHAT_MALFORMED_CHUNKS),
    uploadBucket: readTrimmed(env.ROSTER_CHAT_UPLOAD_BUCKET) || DEFAULT_UPLOAD_BUCKET,
  };
}

function parseMalformedChunkPolicy(value: string | undefined): MalformedChunkPolicy {
  const normalized = readTrimmed(value).toLowerCase() || "fail";
  if (normalized === "fail" || normalized === "skip") {
    return normalized;
  }
  throw new Error(`Invalid ROSTER_CHAT_MALFORMED_CHUNKS "${value}". Use "fail" or "skip".`);
}

function parsePositiveInt(value: string | undefined, name: string, fallback: number): number {
  const trimmed = readTrimmed(value);
  if (!trimmed) {
    return fallback;
  }
  const parsed = Number(trimmed);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name} "${value}". Use a positive integer.`);
  }
  return parsed;
}

function parseBoolean(value: string | undefined, name: string, fallback: boolean): boolean {
  const normalized = readTrimmed(value).toLowerCase();
  if (!normalized) {
    return fallback;
  }
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw new Error(`Invalid ${name} "${value}". Use true or false.`);
}

function readTrimmed(value: string | undefined): string {
  return value?.trim() ?? "";
}
