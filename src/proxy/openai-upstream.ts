import OpenAI from "openai";
import type { WireContentPart, WireMessage } from "../chat-types.js";
import type { UpstreamChatProvider, UpstreamCompletionRequest } from "./upstream.js";

export class OpenAiUpstreamProvider implements UpstreamChatProvider {
  async openStream(request: UpstreamCompletionRequest): Promise<AsyncIterable<unknown>> {
    const client = new OpenAI({
      apiKey: request.apiKey,
      baseURL: request.baseUrl,
    });

    return client.chat.completions.create(
      {
        model: request.model,
        stream: true,
        stream_options: { include_usage: true },
        messages: request.messages.map(toProviderMessage),
      },
      { signal: request.signal },
    );
  }
}

export function toProviderMessage(message: WireMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: flattenText(message.content) };
    case "assistant":
      return { role: "assistant", content: flattenText(message.content) };
    case "user":
      return {
        role: "user",
        content: typeof message.content === "string" ? message.content : message.content.map(toProviderPart),
      };
  }
}

function toProviderPart(part: WireContentPart): OpenAI.Chat.ChatCompletionContentPart {
  if (part.type === "text") {
    return { type: "text", text: part.text };
  }
  return { type: "image_url", image_url: { url: part.image_url.url } };
}

/** System and assistant turns only carry text upstream; image parts on them are dropped. */
function flattenText(content: string | WireContentPart[]): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => (part.type === "text" ? part.text : ""))
    .filter(Boolean)
    .join("\n");
}
