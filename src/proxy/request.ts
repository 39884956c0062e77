import type {
  ChatRequestPayload,
  ChatRole,
  WireAttachment,
  WireContentPart,
  WireMessage,
} from "../chat-types.js";
import { isRecord } from "../core/values.js";
import { ChatError } from "../errors.js";

const ROLES: readonly ChatRole[] = ["system", "user", "assistant"];

export function parseChatRequest(body: unknown): ChatRequestPayload {
  if (!isRecord(body)) {
    throw invalid("request body must be an object");
  }

  const modelIdentifier = assertString(body.model_identifier, "model_identifier");
  const clientMessageId = assertString(body.client_message_id, "client_message_id");

  if (!Array.isArray(body.messages) || body.messages.length === 0) {
    throw invalid("`messages` must be a non-empty array", "messages");
  }
  const messages = body.messages.map((message, index) => parseMessage(message, index));

  const attachmentsRaw = body.attachments ?? [];
  if (!Array.isArray(attachmentsRaw)) {
    throw invalid("`attachments` must be an array", "attachments");
  }
  const attachments = attachmentsRaw.map((attachment, index) => parseAttachment(attachment, index));

  return {
    model_identifier: modelIdentifier,
    messages,
    client_message_id: clientMessageId,
    attachments,
  };
}

function parseMessage(value: unknown, index: number): WireMessage {
  const field = `messages[${index}]`;
  if (!isRecord(value)) {
    throw invalid(`\`${field}\` must be an object`, field);
  }
  const role = value.role;
  if (typeof role !== "string" || !isRole(role)) {
    throw invalid(`\`${field}.role\` must be one of ${ROLES.join(", ")}`, `${field}.role`);
  }
  const content = value.content;
  if (typeof content === "string") {
    return { role, content };
  }
  if (!Array.isArray(content)) {
    throw invalid(`\`${field}.content\` must be a string or an array of parts`, `${field}.content`);
  }
  return {
    role,
    content: content.map((part, partIndex) => parseContentPart(part, `${field}.content[${partIndex}]`)),
  };
}

function parseContentPart(value: unknown, field: string): WireContentPart {
  if (!isRecord(value)) {
    throw invalid(`\`${field}\` must be an object`, field);
  }
  if (value.type === "text" && typeof value.text === "string") {
    return { type: "text", text: value.text };
  }
  if (value.type === "image_url" && isRecord(value.image_url) && typeof value.image_url.url === "string") {
    return { type: "image_url", image_url: { url: value.image_url.url } };
  }
  throw invalid(`\`${field}\` must be a text or image_url part`, field);
}

function parseAttachment(value: unknown, index: number): WireAttachment {
  const field = `attachments[${index}]`;
  if (!isRecord(value)) {
    throw invalid(`\`${field}\` must be an object`, field);
  }
  return {
    type: assertString(value.type, `${field}.type`),
    url: assertString(value.url, `${field}.url`),
    contentType: assertString(value.contentType, `${field}.contentType`),
  };
}

function isRole(value: string): value is ChatRole {
  return ROLES.some((role) => role === value);
}

function assertString(value: unknown, field: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw invalid(`\`${field}\` must be a non-empty string`, field);
  }
  return value.trim();
}

function invalid(message: string, field?: string): ChatError {
  return new ChatError("invalid_request", `invalid request: ${message}`, {
    data: field ? { field } : undefined,
  });
}
