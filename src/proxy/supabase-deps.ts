import { createClient } from "@supabase/supabase-js";
import type { EnvRecord, ServerConfig } from "../config.js";
import { SupabaseModelConfigRepository } from "../models/supabase.js";
import { SupabaseAuthVerifier } from "./auth.js";
import type { ChatProxyDeps } from "./handler.js";
import { OpenAiUpstreamProvider } from "./openai-upstream.js";
import { SupabaseUsageLogWriter } from "./usage-log.js";

export function createSupabaseProxyDeps(
  config: ServerConfig,
  env: EnvRecord = process.env,
): ChatProxyDeps {
  const serviceClient = createClient(config.supabaseUrl, config.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });

  return {
    auth: new SupabaseAuthVerifier(config.supabaseUrl, config.anonKey),
    models: new SupabaseModelConfigRepository(serviceClient),
    upstream: new OpenAiUpstreamProvider(),
    usageLog: new SupabaseUsageLogWriter(serviceClient),
    getSecret: (name) => env[name]?.trim() || undefined,
    logRejectedRequests: config.logRejectedRequests,
  };
}
