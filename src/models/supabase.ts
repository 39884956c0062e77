import type { SupabaseClient } from "@supabase/supabase-js";
import { ChatError } from "../errors.js";
import {
  MODEL_CONFIG_COLUMNS,
  MODEL_OPTION_COLUMNS,
  decodeModelConfig,
  type ModelConfigRepository,
  type ModelConfigSource,
  type ResolvedModelConfig,
} from "./registry.js";

export const MODEL_CONFIG_TABLE = "ai_model_configs";

export class SupabaseModelConfigSource implements ModelConfigSource {
  constructor(private readonly client: SupabaseClient) {}

  async fetchActiveRows(): Promise<unknown> {
    const { data, error } = await this.client
      .from(MODEL_CONFIG_TABLE)
      .select(MODEL_OPTION_COLUMNS)
      .eq("is_active", true)
      .order("ordering", { ascending: true });
    if (error) {
      throw new ChatError("network_error", `failed to load models: ${error.message}`, {
        data: { code: error.code },
      });
    }
    return data;
  }
}

export class SupabaseModelConfigRepository implements ModelConfigRepository {
  constructor(private readonly client: SupabaseClient) {}

  async findActiveConfig(modelIdentifier: string): Promise<ResolvedModelConfig | null> {
    const { data, error } = await this.client
      .from(MODEL_CONFIG_TABLE)
      .select(MODEL_CONFIG_COLUMNS)
      .eq("model_identifier", modelIdentifier)
      .eq("is_active", true)
      .maybeSingle();
    if (error) {
      throw new ChatError("network_error", `model config lookup failed: ${error.message}`, {
        data: { code: error.code },
      });
    }
    return decodeModelConfig(data);
  }
}
