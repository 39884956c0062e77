import type { ChatMessage, ChatRequestPayload, WireAttachment, WireContentPart, WireMessage } from "../chat-types.js";

export const DEFAULT_CONTEXT_USER_TURNS = 6;

export type BuildChatRequestInput = {
  history: ChatMessage[];
  userMessage: ChatMessage;
  modelIdentifier: string;
  maxUserTurns?: number;
};

/**
 * Smallest chronological suffix of the finalized history that holds at most
 * `maxUserTurns` user messages. `userMessage` is appended when the history
 * does not already contain it.
 */
export function selectContextWindow(
  history: ChatMessage[],
  userMessage: ChatMessage,
  maxUserTurns = DEFAULT_CONTEXT_USER_TURNS,
): ChatMessage[] {
  const combined = history.filter((message) => message.state.kind === "normal");
  if (!combined.some((message) => message.id === userMessage.id)) {
    combined.push(userMessage);
  }

  const limit = Math.max(1, Math.floor(maxUserTurns));
  const window: ChatMessage[] = [];
  let userCount = 0;
  for (let index = combined.length - 1; index >= 0; index -= 1) {
    const message = combined[index];
    if (!message) {
      continue;
    }
    window.push(message);
    if (message.role === "user") {
      userCount += 1;
      if (userCount >= limit) {
        break;
      }
    }
  }
  return window.reverse();
}

export function toWireMessage(message: ChatMessage): WireMessage {
  const content: WireContentPart[] = [];
  if (message.content) {
    content.push({ type: "text", text: message.content });
  }
  for (const attachment of message.attachments) {
    content.push({ type: "image_url", image_url: { url: attachment.url } });
  }
  return { role: message.role, content };
}

export function toWireAttachments(message: ChatMessage): WireAttachment[] {
  return message.attachments.map((attachment) => ({
    type: attachment.kind,
    url: attachment.url,
    contentType: attachment.contentType,
  }));
}

export function buildChatRequest(input: BuildChatRequestInput): ChatRequestPayload {
  const window = selectContextWindow(input.history, input.userMessage, input.maxUserTurns);
  return {
    model_identifier: input.modelIdentifier,
    messages: window.map(toWireMessage),
    client_message_id: input.userMessage.id,
    attachments: toWireAttachments(input.userMessage),
  };
}
