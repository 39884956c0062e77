import { randomUUID } from "node:crypto";
import type { ChatAttachment, ChatMessage, ChatRequestPayload, ModelOption, StreamChunk, UsageMetrics } from "../chat-types.js";
import { failedState, NORMAL_STATE, STOPPED_STATE, STREAMING_STATE } from "../chat-types.js";
import { describeChatError, EMPTY_OUTPUT_REASON, isChatError } from "../errors.js";
import type { AttachmentUploader, ImageUpload } from "./attachments.js";
import type { ChatTransport } from "./chat-service.js";
import { buildChatRequest, DEFAULT_CONTEXT_USER_TURNS } from "./context-builder.js";
import type { ChatHistoryStore } from "./history-store.js";

export const DEFAULT_PULSE_INTERVAL_MS = 400;
export const NO_MODEL_AVAILABLE = "no model available";

export type GenerationOutcome = "completed" | "empty" | "failed" | "stopped";

export type ChatControllerState = {
  models: ModelOption[];
  selectedModel: ModelOption | null;
  messages: ChatMessage[];
  isLoadingModels: boolean;
  isStreaming: boolean;
  serviceError: string | null;
  usage: UsageMetrics | null;
  draftAttachments: ChatAttachment[];
  isUploadingAttachment: boolean;
  attachmentError: string | null;
  /** Id of the message the view should keep in sight. */
  scrollTargetId: string | null;
};

export type ChatControllerListener = (state: ChatControllerState) => void;

export interface ModelCatalog {
  listActiveModels(): Promise<ModelOption[]>;
}

export type ChatControllerOptions = {
  models: ModelCatalog;
  transport: ChatTransport;
  store: ChatHistoryStore;
  uploader?: AttachmentUploader;
  getAccessToken?: () => string | undefined | Promise<string | undefined>;
  maxUserTurns?: number;
  /** Light feedback while text streams in, at most once per `pulseIntervalMs`. */
  onPulse?: () => void;
  pulseIntervalMs?: number;
  now?: () => Date;
  createId?: () => string;
};

type Generation = {
  messageId: string;
  model: ModelOption;
  abort: AbortController;
  text: string;
  usage: UsageMetrics | null;
  outcome: GenerationOutcome | null;
};

const INITIAL_STATE: ChatControllerState = {
  models: [],
  selectedModel: null,
  messages: [],
  isLoadingModels: false,
  isStreaming: false,
  serviceError: null,
  usage: null,
  draftAttachments: [],
  isUploadingAttachment: false,
  attachmentError: null,
  scrollTargetId: null,
};

/**
 * Owns the conversation for the selected model and the single in-flight generation.
 * State snapshots are replaced, never mutated, and every change is pushed to subscribers.
 */
export class ChatController {
  private state: ChatControllerState = INITIAL_STATE;
  private readonly listeners = new Set<ChatControllerListener>();
  private readonly cache = new Map<string, ChatMessage[]>();
  private active: Generation | null = null;
  private lastUsedModelIdentifier: string | null = null;
  private lastPulseAtMs = Number.NEGATIVE_INFINITY;
  private readonly now: () => Date;
  private readonly createId: () => string;

  constructor(private readonly options: ChatControllerOptions) {
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? (() => randomUUID());
  }

  getState(): ChatControllerState {
    return this.state;
  }

  subscribe(listener: ChatControllerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async loadModels(options: { force?: boolean } = {}): Promise<void> {
    if (this.state.isLoadingModels) {
      return;
    }
    if (!options.force && this.state.models.length > 0) {
      this.loadMessagesForSelectedModel();
      return;
    }

    this.update({ isLoadingModels: true });
    try {
      const models = await this.options.models.listActiveModels();
      const restored =
        models.find((model) => model.modelIdentifier === this.lastUsedModelIdentifier) ?? models[0] ?? null;
      this.update({ models, isLoadingModels: false });
      this.applySelection(restored);
    } catch (error) {
      this.update({ isLoadingModels: false, serviceError: describeChatError(error) });
    }
  }

  selectModel(modelIdentifier: string): boolean {
    const model = this.state.models.find((item) => item.modelIdentifier === modelIdentifier);
    if (!model) {
      return false;
    }
    if (this.state.selectedModel?.modelIdentifier === model.modelIdentifier) {
      return true;
    }
    this.applySelection(model);
    return true;
  }

  async sendMessage(text: string): Promise<GenerationOutcome | null> {
    if (this.active) {
      return null;
    }
    const model = this.state.selectedModel;
    if (!model) {
      this.update({ serviceError: NO_MODEL_AVAILABLE });
      return null;
    }
    const content = text.trim();
    if (!content && this.state.draftAttachments.length === 0) {
      return null;
    }

    const userMessage: ChatMessage = {
      id: this.createId(),
      role: "user",
      content,
      createdAt: this.now().toISOString(),
      attachments: this.state.draftAttachments,
      state: NORMAL_STATE,
    };
    this.setMessages([...this.state.messages, userMessage], {
      draftAttachments: [],
      scrollTargetId: userMessage.id,
    });
    this.persist(model, userMessage);

    return this.startGeneration(userMessage, model);
  }

  /** Marks the pending reply stopped and aborts its request. Returns false when nothing is streaming. */
  stopGeneration(): boolean {
    const generation = this.active;
    if (!generation || generation.outcome) {
      return false;
    }
    this.settle(generation, "stopped");
    generation.abort.abort();

    const stopped = this.patchMessage(generation.messageId, (message) => ({ ...message, state: STOPPED_STATE }));
    this.update({ isStreaming: false });
    if (stopped) {
      this.persist(generation.model, stopped);
    }
    return true;
  }

  canRetry(): boolean {
    const last = this.state.messages.at(-1);
    return (
      last?.role === "assistant" && (last.state.kind === "failed" || last.state.kind === "stopped")
    );
  }

  canRegenerate(): boolean {
    const last = this.state.messages.at(-1);
    return last?.role === "assistant" && last.state.kind === "normal";
  }

  async retryLastRequest(): Promise<GenerationOutcome | null> {
    if (!this.canRetry()) {
      return null;
    }
    return this.reissueLastRequest();
  }

  async regenerateResponse(): Promise<GenerationOutcome | null> {
    if (!this.canRegenerate()) {
      return null;
    }
    return this.reissueLastRequest();
  }

  clearHistory(): void {
    const model = this.state.selectedModel;
    if (!model) {
      return;
    }
    this.abandonGeneration();
    this.setMessages([], { usage: null, scrollTargetId: null });
    this.withStore(() => this.options.store.clear(model.modelIdentifier));
  }

  resetForSignOut(): void {
    this.abandonGeneration();
    this.cache.clear();
    this.update({
      messages: [],
      usage: null,
      draftAttachments: [],
      serviceError: null,
      attachmentError: null,
      scrollTargetId: null,
    });
  }

  async addImageAttachment(image: ImageUpload): Promise<ChatAttachment | null> {
    const uploader = this.options.uploader;
    if (!uploader) {
      this.update({ attachmentError: "image upload is not configured" });
      return null;
    }
    if (this.state.isUploadingAttachment) {
      return null;
    }

    this.update({ isUploadingAttachment: true, attachmentError: null });
    try {
      const fileName = image.fileName.trim() || `image-${this.createId()}.jpg`;
      const url = await uploader.upload({ ...image, fileName });
      const attachment: ChatAttachment = {
        id: this.createId(),
        kind: "image",
        url,
        contentType: image.contentType,
      };
      this.update({
        isUploadingAttachment: false,
        draftAttachments: [...this.state.draftAttachments, attachment],
        scrollTargetId: attachment.id,
      });
      return attachment;
    } catch (error) {
      this.update({ isUploadingAttachment: false, attachmentError: describeChatError(error) });
      return null;
    }
  }

  removeDraftAttachment(attachmentId: string): void {
    this.update({
      draftAttachments: this.state.draftAttachments.filter((attachment) => attachment.id !== attachmentId),
    });
  }

  dismissServiceError(): void {
    if (this.state.serviceError !== null) {
      this.update({ serviceError: null });
    }
  }

  private async reissueLastRequest(): Promise<GenerationOutcome | null> {
    const model = this.state.selectedModel;
    if (!model || this.active) {
      return null;
    }
    const userMessage = findLastUserMessage(this.state.messages);
    if (!userMessage) {
      return null;
    }
    this.removeTrailingAssistant(model);
    return this.startGeneration(userMessage, model);
  }

  private startGeneration(userMessage: ChatMessage, model: ModelOption): Promise<GenerationOutcome> {
    const payload = buildChatRequest({
      history: this.state.messages,
      userMessage,
      modelIdentifier: model.modelIdentifier,
      maxUserTurns: this.options.maxUserTurns ?? DEFAULT_CONTEXT_USER_TURNS,
    });

    const placeholder: ChatMessage = {
      id: this.createId(),
      role: "assistant",
      content: "",
      createdAt: this.now().toISOString(),
      attachments: [],
      state: STREAMING_STATE,
    };
    const generation: Generation = {
      messageId: placeholder.id,
      model,
      abort: new AbortController(),
      text: "",
      usage: null,
      outcome: null,
    };
    this.active = generation;
    this.setMessages([...this.state.messages, placeholder], {
      isStreaming: true,
      usage: null,
      serviceError: null,
      scrollTargetId: placeholder.id,
    });

    return this.consume(generation, payload);
  }

  private async consume(generation: Generation, payload: ChatRequestPayload): Promise<GenerationOutcome> {
    try {
      const accessToken = await this.options.getAccessToken?.();
      const stream = this.options.transport.streamChat(payload, {
        accessToken,
        signal: generation.abort.signal,
      });
      for await (const chunk of stream) {
        if (generation.outcome) {
          break;
        }
        this.applyChunk(generation, chunk);
      }
    } catch (error) {
      if (generation.outcome) {
        return generation.outcome;
      }
      return this.finalizeFailure(generation, error);
    }
    if (generation.outcome) {
      return generation.outcome;
    }
    return this.finalizeCompleted(generation);
  }

  private applyChunk(generation: Generation, chunk: StreamChunk): void {
    generation.text += chunk.textDelta;
    if (chunk.usage) {
      generation.usage = chunk.usage;
    }
    this.patchMessage(generation.messageId, (message) => ({ ...message, content: generation.text }));
    this.update({ usage: generation.usage, scrollTargetId: generation.messageId });
    this.pulse();
  }

  private finalizeCompleted(generation: Generation): GenerationOutcome {
    if (!generation.text) {
      this.settle(generation, "empty");
      this.patchMessage(generation.messageId, (message) => ({
        ...message,
        state: failedState(EMPTY_OUTPUT_REASON),
      }));
      this.update({ isStreaming: false, usage: generation.usage });
      return "empty";
    }

    this.settle(generation, "completed");
    const finalized = this.patchMessage(generation.messageId, (message) => {
      const next: ChatMessage = {
        ...message,
        content: generation.text,
        createdAt: this.now().toISOString(),
        state: NORMAL_STATE,
      };
      if (generation.usage) {
        next.usage = generation.usage;
      }
      return next;
    });
    this.update({ isStreaming: false, usage: generation.usage });
    if (finalized) {
      this.persist(generation.model, finalized);
    }
    return "completed";
  }

  private finalizeFailure(generation: Generation, error: unknown): GenerationOutcome {
    this.settle(generation, "failed");
    const reason = describeChatError(error);
    this.patchMessage(generation.messageId, (message) => ({ ...message, state: failedState(reason) }));
    this.update({ isStreaming: false, serviceError: reason });
    if (isChatError(error) && error.code === "model_not_available") {
      void this.loadModels({ force: true });
    }
    return "failed";
  }

  private settle(generation: Generation, outcome: GenerationOutcome): void {
    generation.outcome = outcome;
    if (this.active === generation) {
      this.active = null;
    }
  }

  /** Cancels the in-flight request without keeping its placeholder. */
  private abandonGeneration(): void {
    const generation = this.active;
    if (!generation) {
      return;
    }
    this.settle(generation, "stopped");
    generation.abort.abort();
    this.update({ isStreaming: false });
  }

  private pulse(): void {
    const onPulse = this.options.onPulse;
    if (!onPulse) {
      return;
    }
    const nowMs = this.now().getTime();
    const interval = this.options.pulseIntervalMs ?? DEFAULT_PULSE_INTERVAL_MS;
    if (nowMs - this.lastPulseAtMs < interval) {
      return;
    }
    this.lastPulseAtMs = nowMs;
    onPulse();
  }

  private applySelection(model: ModelOption | null): void {
    // A reply streaming into another model's conversation ends here.
    if (this.active && this.active.model.modelIdentifier !== model?.modelIdentifier) {
      this.stopGeneration();
    }
    this.update({ selectedModel: model });
    this.loadMessagesForSelectedModel();
  }

  private loadMessagesForSelectedModel(): void {
    const model = this.state.selectedModel;
    if (!model) {
      this.update({ messages: [], scrollTargetId: null });
      return;
    }
    this.lastUsedModelIdentifier = model.modelIdentifier;

    const cached = this.cache.get(model.modelIdentifier);
    if (cached) {
      this.update({ messages: cached, scrollTargetId: cached.at(-1)?.id ?? null });
      return;
    }
    this.withStore(() => {
      const loaded = this.options.store.load(model.modelIdentifier);
      this.setMessages(loaded, { scrollTargetId: loaded.at(-1)?.id ?? null });
    });
  }

  private removeTrailingAssistant(model: ModelOption): void {
    const last = this.state.messages.at(-1);
    if (!last || last.role !== "assistant") {
      return;
    }
    this.setMessages(this.state.messages.slice(0, -1));
    this.withStore(() => this.options.store.remove(model.modelIdentifier, last.id));
  }

  private persist(model: ModelOption, message: ChatMessage): void {
    this.withStore(() => this.options.store.upsert(model.modelIdentifier, message));
  }

  private withStore(action: () => void): void {
    try {
      action();
    } catch (error) {
      this.update({ serviceError: describeChatError(error) });
    }
  }

  private patchMessage(messageId: string, patch: (message: ChatMessage) => ChatMessage): ChatMessage | null {
    const index = this.state.messages.findIndex((message) => message.id === messageId);
    const current = this.state.messages[index];
    if (index === -1 || !current) {
      return null;
    }
    const next = patch(current);
    const messages = [...this.state.messages];
    messages[index] = next;
    this.setMessages(messages);
    return next;
  }

  private setMessages(messages: ChatMessage[], patch: Partial<ChatControllerState> = {}): void {
    const model = this.state.selectedModel;
    if (model) {
      this.cache.set(model.modelIdentifier, messages);
    }
    this.update({ ...patch, messages });
  }

  private update(patch: Partial<ChatControllerState>): void {
    this.state = { ...this.state, ...patch };
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }
}

function findLastUserMessage(messages: ChatMessage[]): ChatMessage | null {
  for (let index = messages.length - 1; index >= 0; index -= 1) {
    const message = messages[index];
    if (message?.role === "user") {
      return message;
    }
  }
  return null;
}
