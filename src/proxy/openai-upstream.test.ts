import { describe, expect, it } from "vitest";
import { toProviderMessage } from "./openai-upstream.js";

describe("toProviderMessage", () => {
  it("keeps user content parts in order", () => {
    expect(
      toProviderMessage({
        role: "user",
        content: [
          { type: "text", text: "what is on this shift?" },
          { type: "image_url", image_url: { url: "https://cdn.example.com/a.png" } },
        ],
      }),
    ).toEqual({
      role: "user",
      content: [
        { type: "text", text: "what is on this shift?" },
        { type: "image_url", image_url: { url: "https://cdn.example.com/a.png" } },
      ],
    });
  });

  it("flattens assistant parts to text", () => {
    expect(
      toProviderMessage({
        role: "assistant",
        content: [
          { type: "text", text: "first" },
          { type: "image_url", image_url: { url: "https://cdn.example.com/b.png" } },
          { type: "text", text: "second" },
        ],
      }),
    ).toEqual({ role: "assistant", content: "first\nsecond" });
  });

  it("passes string content through", () => {
    expect(toProviderMessage({ role: "system", content: "be brief" })).toEqual({
      role: "system",
      content: "be brief",
    });
  });
});
