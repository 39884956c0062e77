import fs from "node:fs";
import path from "node:path";
import type { ChatAttachment, ChatMessage, ChatRole, UsageMetrics } from "../chat-types.js";
import { NORMAL_STATE } from "../chat-types.js";
import { isRecord, readIso, readOptionalCount, readTrimmedString } from "../core/values.js";

export interface ChatHistoryStore {
  load(modelIdentifier: string): ChatMessage[];
  upsert(modelIdentifier: string, message: ChatMessage): void;
  remove(modelIdentifier: string, messageId: string): void;
  clear(modelIdentifier: string): void;
}

type StoredMessage = {
  id: string;
  model_identifier: string;
  role: ChatRole;
  content: string;
  created_at: string;
  attachments: ChatAttachment[];
  usage?: UsageMetrics;
};

type StoredHistory = {
  schema_version: 1;
  model_identifier: string;
  messages: StoredMessage[];
};

/** One JSON file per model under `<dataDir>/history`. Loaded messages come back finalized. */
export class FileChatHistoryStore implements ChatHistoryStore {
  constructor(private readonly dataDir: string) {}

  historyPath(modelIdentifier: string): string {
    const safeName = modelIdentifier.replace(/[^a-zA-Z0-9._-]+/g, "_") || "_";
    return path.join(this.dataDir, "history", `${safeName}.json`);
  }

  load(modelIdentifier: string): ChatMessage[] {
    return this.readRecords(modelIdentifier).map(toChatMessage);
  }

  upsert(modelIdentifier: string, message: ChatMessage): void {
    const records = this.readRecords(modelIdentifier);
    const record = toStoredMessage(modelIdentifier, message);
    const index = records.findIndex((item) => item.id === message.id);
    if (index === -1) {
      records.push(record);
    } else {
      records[index] = record;
    }
    this.writeRecords(modelIdentifier, records);
  }

  remove(modelIdentifier: string, messageId: string): void {
    const records = this.readRecords(modelIdentifier);
    const remaining = records.filter((item) => item.id !== messageId);
    if (remaining.length !== records.length) {
      this.writeRecords(modelIdentifier, remaining);
    }
  }

  clear(modelIdentifier: string): void {
    fs.rmSync(this.historyPath(modelIdentifier), { force: true });
  }

  private readRecords(modelIdentifier: string): StoredMessage[] {
    const filePath = this.historyPath(modelIdentifier);
    if (!fs.existsSync(filePath)) {
      return [];
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch {
      return [];
    }
    if (!isRecord(parsed) || !Array.isArray(parsed.messages)) {
      return [];
    }
    const records: StoredMessage[] = [];
    for (const raw of parsed.messages) {
      const record = normalizeStoredMessage(raw, modelIdentifier);
      if (record) {
        records.push(record);
      }
    }
    return sortByCreatedAt(records);
  }

  private writeRecords(modelIdentifier: string, records: StoredMessage[]): void {
    const payload: StoredHistory = {
      schema_version: 1,
      model_identifier: modelIdentifier,
      messages: sortByCreatedAt(records),
    };
    writeAtomicText(this.historyPath(modelIdentifier), `${JSON.stringify(payload, null, 2)}\n`);
  }
}

export class MemoryChatHistoryStore implements ChatHistoryStore {
  private readonly records = new Map<string, ChatMessage[]>();

  load(modelIdentifier: string): ChatMessage[] {
    return (this.records.get(modelIdentifier) ?? []).map((message) => ({ ...message, state: NORMAL_STATE }));
  }

  upsert(modelIdentifier: string, message: ChatMessage): void {
    const list = (this.records.get(modelIdentifier) ?? []).filter((item) => item.id !== message.id);
    list.push({ ...message, attachments: [...message.attachments] });
    list.sort((left, right) => left.createdAt.localeCompare(right.createdAt));
    this.records.set(modelIdentifier, list);
  }

  remove(modelIdentifier: string, messageId: string): void {
    const list = this.records.get(modelIdentifier);
    if (list) {
      this.records.set(
        modelIdentifier,
        list.filter((item) => item.id !== messageId),
      );
    }
  }

  clear(modelIdentifier: string): void {
    this.records.delete(modelIdentifier);
  }
}

function toStoredMessage(modelIdentifier: string, message: ChatMessage): StoredMessage {
  const record: StoredMessage = {
    id: message.id,
    model_identifier: modelIdentifier,
    role: message.role,
    content: message.content,
    created_at: message.createdAt,
    attachments: message.attachments,
  };
  if (message.usage) {
    record.usage = message.usage;
  }
  return record;
}

function toChatMessage(record: StoredMessage): ChatMessage {
  const message: ChatMessage = {
    id: record.id,
    role: record.role,
    content: record.content,
    createdAt: record.created_at,
    attachments: record.attachments,
    state: NORMAL_STATE,
  };
  if (record.usage) {
    message.usage = record.usage;
  }
  return message;
}

function normalizeStoredMessage(value: unknown, modelIdentifier: string): StoredMessage | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = readTrimmedString(value.id);
  const createdAt = readIso(value.created_at);
  if (!id || !createdAt || typeof value.content !== "string") {
    return null;
  }
  const roleRaw = readTrimmedString(value.role);
  const role: ChatRole = roleRaw === "user" || roleRaw === "system" ? roleRaw : "assistant";

  const record: StoredMessage = {
    id,
    model_identifier: modelIdentifier,
    role,
    content: value.content,
    created_at: createdAt,
    attachments: normalizeAttachments(value.attachments),
  };
  const usage = normalizeUsage(value.usage);
  if (usage) {
    record.usage = usage;
  }
  return record;
}

function normalizeAttachments(value: unknown): ChatAttachment[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const attachments: ChatAttachment[] = [];
  for (const item of value) {
    if (!isRecord(item)) {
      continue;
    }
    const id = readTrimmedString(item.id);
    const url = readTrimmedString(item.url);
    const contentType = readTrimmedString(item.contentType);
    if (!id || !url || !contentType) {
      continue;
    }
    attachments.push({ id, kind: "image", url, contentType });
  }
  return attachments;
}

function normalizeUsage(value: unknown): UsageMetrics | null {
  if (!isRecord(value)) {
    return null;
  }
  const usage: UsageMetrics = {};
  const promptTokens = readOptionalCount(value.promptTokens);
  const completionTokens = readOptionalCount(value.completionTokens);
  const totalTokens = readOptionalCount(value.totalTokens);
  if (promptTokens !== undefined) {
    usage.promptTokens = promptTokens;
  }
  if (completionTokens !== undefined) {
    usage.completionTokens = completionTokens;
  }
  if (totalTokens !== undefined) {
    usage.totalTokens = totalTokens;
  }
  return usage;
}

function sortByCreatedAt(records: StoredMessage[]): StoredMessage[] {
  return [...records].sort((left, right) => left.created_at.localeCompare(right.created_at));
}

function writeAtomicText(filePath: string, payload: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, payload, "utf8");
  fs.renameSync(tmpPath, filePath);
}
