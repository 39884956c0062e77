export type ChatRole = "user" | "assistant" | "system";

export type MessageState =
  | { kind: "normal" }
  | { kind: "streaming" }
  | { kind: "failed"; reason: string | null }
  | { kind: "stopped" };

export type ChatAttachment = {
  id: string;
  kind: "image";
  url: string;
  contentType: string;
};

export type UsageMetrics = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
};

export type ChatMessage = {
  id: string;
  role: ChatRole;
  content: string;
  createdAt: string;
  attachments: ChatAttachment[];
  state: MessageState;
  usage?: UsageMetrics;
};

export type ModelOption = {
  id: string;
  displayName: string;
  modelIdentifier: string;
  baseUrl: string;
  isActive: boolean;
  ordering: number;
};

export type StreamChunk = {
  textDelta: string;
  finishReason: string | null;
  usage: UsageMetrics | null;
};

export type WireContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export type WireMessage = {
  role: ChatRole;
  content: string | WireContentPart[];
};

export type WireAttachment = {
  type: string;
  url: string;
  contentType: string;
};

export type ChatRequestPayload = {
  model_identifier: string;
  messages: WireMessage[];
  client_message_id: string;
  attachments: WireAttachment[];
};

export type UsageLogStatus = "success" | "error" | "cancelled";

export type UsageLogEntry = {
  user_id: string;
  model_identifier: string;
  request_id: string;
  status: UsageLogStatus;
  prompt_tokens: number | null;
  completion_tokens: number | null;
  total_tokens: number | null;
  error_code: string | null;
  error_message: string | null;
  latency_ms: number;
};

export const NORMAL_STATE: MessageState = { kind: "normal" };
export const STREAMING_STATE: MessageState = { kind: "streaming" };
export const STOPPED_STATE: MessageState = { kind: "stopped" };

export function failedState(reason: string | null): MessageState {
  return { kind: "failed", reason };
}
