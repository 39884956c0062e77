import type { ModelOption } from "../chat-types.js";
import { isRecord, readTrimmedString } from "../core/values.js";
import { ChatError, errorMessage } from "../errors.js";

export const DEFAULT_MODEL_ORDERING = 100;

export const MODEL_OPTION_COLUMNS = "id,display_name,model_identifier,base_url,is_active,ordering";
export const MODEL_CONFIG_COLUMNS = "model_identifier,base_url,system_prompt,api_secret_name,display_name";

export interface ModelConfigSource {
  fetchActiveRows(): Promise<unknown>;
}

export type ResolvedModelConfig = {
  modelIdentifier: string;
  displayName: string;
  baseUrl: string;
  systemPrompt: string;
  apiSecretName: string;
};

export interface ModelConfigRepository {
  findActiveConfig(modelIdentifier: string): Promise<ResolvedModelConfig | null>;
}

export class ModelRegistry {
  constructor(private readonly source: ModelConfigSource) {}

  async listActiveModels(): Promise<ModelOption[]> {
    let rows: unknown;
    try {
      rows = await this.source.fetchActiveRows();
    } catch (error) {
      if (error instanceof ChatError) {
        throw error;
      }
      throw new ChatError("network_error", `failed to load models: ${errorMessage(error)}`);
    }
    return normalizeModelRows(rows);
  }
}

export function normalizeModelRows(rows: unknown): ModelOption[] {
  if (!Array.isArray(rows)) {
    throw new ChatError("decode_error", "model list is not an array");
  }

  const options: ModelOption[] = [];
  for (const row of rows) {
    const option = decodeModelRow(row);
    if (option && option.isActive) {
      options.push(option);
    }
  }
  return options.sort(compareModelOptions);
}

export function compareModelOptions(left: ModelOption, right: ModelOption): number {
  if (left.ordering !== right.ordering) {
    return left.ordering - right.ordering;
  }
  if (left.displayName === right.displayName) {
    return 0;
  }
  return left.displayName < right.displayName ? -1 : 1;
}

export function parseBaseUrl(value: string): string | null {
  try {
    const url = new URL(value);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return null;
    }
    return url.toString();
  } catch {
    return null;
  }
}

/** Returns null for rows whose base URL does not parse; throws on rows missing identity columns. */
function decodeModelRow(row: unknown): ModelOption | null {
  if (!isRecord(row)) {
    throw new ChatError("decode_error", "model row is not an object");
  }
  const id = readRequiredColumn(row, "id");
  const displayName = readRequiredColumn(row, "display_name");
  const modelIdentifier = readRequiredColumn(row, "model_identifier");

  const baseUrl = parseBaseUrl(readTrimmedString(row.base_url));
  if (!baseUrl) {
    return null;
  }

  const ordering =
    typeof row.ordering === "number" && Number.isFinite(row.ordering)
      ? Math.floor(row.ordering)
      : DEFAULT_MODEL_ORDERING;

  return {
    id,
    displayName,
    modelIdentifier,
    baseUrl,
    isActive: row.is_active !== false,
    ordering,
  };
}

function readRequiredColumn(row: Record<string, unknown>, column: string): string {
  const raw = row[column];
  const value = typeof raw === "number" ? String(raw) : readTrimmedString(raw);
  if (!value) {
    throw new ChatError("decode_error", `model row is missing \`${column}\``, { data: { column } });
  }
  return value;
}

export function decodeModelConfig(row: unknown): ResolvedModelConfig | null {
  if (!isRecord(row)) {
    return null;
  }
  const modelIdentifier = readTrimmedString(row.model_identifier);
  const baseUrl = parseBaseUrl(readTrimmedString(row.base_url));
  const apiSecretName = readTrimmedString(row.api_secret_name);
  if (!modelIdentifier || !baseUrl || !apiSecretName) {
    return null;
  }
  return {
    modelIdentifier,
    displayName: readTrimmedString(row.display_name) || modelIdentifier,
    baseUrl,
    systemPrompt: typeof row.system_prompt === "string" ? row.system_prompt : "",
    apiSecretName,
  };
}
