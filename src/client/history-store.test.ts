import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import type { ChatMessage } from "../chat-types.js";
import { FileChatHistoryStore, MemoryChatHistoryStore } from "./history-store.js";

const cleanupDirs: string[] = [];

afterEach(() => {
  for (const dir of cleanupDirs.splice(0, cleanupDirs.length)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function tempStore(): { store: FileChatHistoryStore; root: string } {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "roster-chat-history-"));
  cleanupDirs.push(root);
  return { store: new FileChatHistoryStore(root), root };
}

const userMessage: ChatMessage = {
  id: "u-1",
  role: "user",
  content: "who is on the night shift?",
  createdAt: "2026-01-01T08:00:00.000Z",
  attachments: [{ id: "a-1", kind: "image", url: "https://cdn.example.com/roster.png", contentType: "image/png" }],
  state: { kind: "normal" },
};

const assistantMessage: ChatMessage = {
  id: "a-1",
  role: "assistant",
  content: "Sam and Ali.",
  createdAt: "2026-01-01T08:00:05.000Z",
  attachments: [],
  state: { kind: "stopped" },
  usage: { totalTokens: 12 },
};

describe("FileChatHistoryStore", () => {
  it("persists messages per model and reloads them finalized in order", () => {
    const { store } = tempStore();
    store.upsert("gpt-x", assistantMessage);
    store.upsert("gpt-x", userMessage);
    store.upsert("other-model", { ...userMessage, id: "u-2" });

    const loaded = store.load("gpt-x");
    expect(loaded.map((message) => message.id)).toEqual(["u-1", "a-1"]);
    expect(loaded[0]).toEqual(userMessage);
    expect(loaded[1]).toEqual({ ...assistantMessage, state: { kind: "normal" } });
    expect(store.load("other-model").map((message) => message.id)).toEqual(["u-2"]);
  });

  it("updates existing records and removes single messages", () => {
    const { store } = tempStore();
    store.upsert("gpt-x", userMessage);
    store.upsert("gpt-x", assistantMessage);
    store.upsert("gpt-x", { ...assistantMessage, content: "Sam, Ali and Jo." });
    expect(store.load("gpt-x")[1]?.content).toBe("Sam, Ali and Jo.");

    store.remove("gpt-x", "a-1");
    expect(store.load("gpt-x").map((message) => message.id)).toEqual(["u-1"]);

    store.clear("gpt-x");
    expect(store.load("gpt-x")).toEqual([]);
  });

  it("keeps unsafe model identifiers inside the history directory", () => {
    const { store, root } = tempStore();
    expect(store.historyPath("../../etc/passwd")).toBe(path.join(root, "history", ".._.._etc_passwd.json"));
  });

  it("treats unreadable files as empty and skips broken rows", () => {
    const { store } = tempStore();
    const filePath = store.historyPath("gpt-x");
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "{not json", "utf8");
    expect(store.load("gpt-x")).toEqual([]);

    fs.writeFileSync(
      filePath,
      JSON.stringify({
        schema_version: 1,
        messages: [
          { id: "ok", role: "user", content: "hi", created_at: "2026-01-01T00:00:00Z", attachments: "nope" },
          { id: "", role: "user", content: "missing id", created_at: "2026-01-01T00:00:00Z" },
          { id: "bad-date", role: "user", content: "x", created_at: "yesterday" },
        ],
      }),
      "utf8",
    );
    expect(store.load("gpt-x")).toEqual([
      {
        id: "ok",
        role: "user",
        content: "hi",
        createdAt: "2026-01-01T00:00:00.000Z",
        attachments: [],
        state: { kind: "normal" },
      },
    ]);
  });
});

describe("MemoryChatHistoryStore", () => {
  it("mirrors the file store semantics", () => {
    const store = new MemoryChatHistoryStore();
    store.upsert("gpt-x", assistantMessage);
    store.upsert("gpt-x", userMessage);
    expect(store.load("gpt-x").map((message) => [message.id, message.state.kind])).toEqual([
      ["u-1", "normal"],
      ["a-1", "normal"],
    ]);
    store.remove("gpt-x", "u-1");
    expect(store.load("gpt-x").map((message) => message.id)).toEqual(["a-1"]);
    store.clear("gpt-x");
    expect(store.load("gpt-x")).toEqual([]);
  });
});
