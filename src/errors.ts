export type ChatErrorCode =
  | "unauthorized"
  | "invalid_request"
  | "model_not_available"
  | "secret_missing"
  | "upstream_error"
  | "network_error"
  | "http_error"
  | "invalid_response"
  | "malformed_chunk"
  | "stream_truncated"
  | "decode_error"
  | "empty_output"
  | "cancelled";

export const CHAT_ERROR_STATUS = {
  unauthorized: 401,
  invalid_request: 400,
  model_not_available: 404,
  secret_missing: 500,
  upstream_error: 502,
} as const satisfies Partial<Record<ChatErrorCode, number>>;

export const EMPTY_OUTPUT_REASON = "empty output, please retry";

export class ChatError extends Error {
  code: ChatErrorCode;
  status?: number;
  data?: unknown;

  constructor(code: ChatErrorCode, message: string, options: { status?: number; data?: unknown } = {}) {
    super(message);
    this.name = "ChatError";
    this.code = code;
    this.status = options.status;
    this.data = options.data;
  }
}

export function isChatError(value: unknown): value is ChatError {
  return value instanceof ChatError;
}

export function describeChatError(error: unknown): string {
  if (isChatError(error)) {
    switch (error.code) {
      case "unauthorized":
        return "please sign in";
      case "network_error":
        return "network issue, please retry";
      case "empty_output":
        return EMPTY_OUTPUT_REASON;
      case "http_error":
        return `request failed (${error.status ?? "unknown"})`;
      case "invalid_response":
        return "unexpected service response";
      default:
        return error.message;
    }
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
