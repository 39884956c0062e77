import React, { useCallback, useState, useSyncExternalStore } from "react";
import { Box, render, Text, useApp, useInput } from "ink";
import Spinner from "ink-spinner";
import type { ChatMessage, UsageMetrics } from "../chat-types.js";
import { readImageFile, type ImageUpload } from "../client/attachments.js";
import type { ChatController } from "../client/chat-controller.js";
import { errorMessage } from "../errors.js";

const VISIBLE_MESSAGES = 12;
const IMAGE_COMMAND = "/image ";

export type ChatAppProps = {
  controller: ChatController;
  readImage?: (rawPath: string) => { ok: true; image: ImageUpload } | { ok: false; error: string };
};

export function ChatApp({ controller, readImage = readImageFile }: ChatAppProps) {
  const { exit } = useApp();
  const subscribe = useCallback((onChange: () => void) => controller.subscribe(onChange), [controller]);
  const state = useSyncExternalStore(subscribe, () => controller.getState());
  const [draft, setDraft] = useState("");
  const [notice, setNotice] = useState<string | null>(null);

  const run = (action: Promise<unknown>) => {
    void action.catch((error: unknown) => setNotice(errorMessage(error)));
  };

  const submit = () => {
    const text = draft;
    setDraft("");
    setNotice(null);
    controller.dismissServiceError();

    if (text.startsWith(IMAGE_COMMAND)) {
      const loaded = readImage(text.slice(IMAGE_COMMAND.length));
      if (!loaded.ok) {
        setNotice(loaded.error);
        return;
      }
      run(controller.addImageAttachment(loaded.image));
      return;
    }
    if (state.isStreaming) {
      setDraft(text);
      setNotice("wait for the reply or press esc to stop it");
      return;
    }
    run(controller.sendMessage(text));
  };

  const cycleModel = () => {
    const { models, selectedModel } = state;
    if (models.length < 2) {
      return;
    }
    const index = models.findIndex((model) => model.modelIdentifier === selectedModel?.modelIdentifier);
    const next = models[(index + 1) % models.length];
    if (next) {
      controller.selectModel(next.modelIdentifier);
    }
  };

  useInput((input, key) => {
    if (key.ctrl && input === "c") {
      controller.stopGeneration();
      exit();
      return;
    }
    if (key.escape) {
      controller.stopGeneration();
      return;
    }
    if (key.ctrl && input === "r") {
      if (controller.canRetry()) {
        run(controller.retryLastRequest());
      } else if (controller.canRegenerate()) {
        run(controller.regenerateResponse());
      }
      return;
    }
    if (key.ctrl && input === "l") {
      controller.clearHistory();
      return;
    }
    if (key.tab) {
      cycleModel();
      return;
    }
    if (key.return) {
      submit();
      return;
    }
    if (key.backspace || key.delete) {
      setDraft((current) => current.slice(0, -1));
      return;
    }
    if (input && !key.ctrl && !key.meta) {
      setDraft((current) => current + input);
    }
  });

  const visible = state.messages.slice(-VISIBLE_MESSAGES);

  return (
    <Box flexDirection="column" paddingX={1}>
      <Box>
        <Text color="cyanBright">roster-chat</Text>
        <Text color="gray"> · </Text>
        {state.isLoadingModels ? (
          <Text color="yellow">
            <Spinner type="dots" /> loading models
          </Text>
        ) : (
          <Text color="white">{state.selectedModel?.displayName ?? "no model"}</Text>
        )}
        {state.models.length > 1 ? <Text color="gray"> (tab to switch)</Text> : null}
      </Box>

      <Box flexDirection="column" marginY={1}>
        {visible.length === 0 ? <Text color="gray">no messages yet</Text> : null}
        {visible.map((message) => (
          <MessageRow key={message.id} message={message} />
        ))}
      </Box>

      {state.usage ? <Text color="gray">{formatUsage(state.usage)}</Text> : null}
      {state.serviceError ? <Text color="red">{state.serviceError}</Text> : null}
      {state.attachmentError ? <Text color="yellow">{state.attachmentError}</Text> : null}
      {notice ? <Text color="yellow">{notice}</Text> : null}
      {state.isUploadingAttachment ? (
        <Text color="yellow">
          <Spinner type="dots" /> uploading image
        </Text>
      ) : null}
      {state.draftAttachments.map((attachment) => (
        <Text key={attachment.id} color="magenta">
          [image] {attachment.url}
        </Text>
      ))}

      <Box>
        <Text color="green">› </Text>
        <Text>{draft}</Text>
        <Text color="gray">▏</Text>
      </Box>
      <Text color="gray">enter send · esc stop · ctrl+r retry · ctrl+l clear · /image path · ctrl+c quit</Text>
    </Box>
  );
}

function MessageRow({ message }: { message: ChatMessage }) {
  const isUser = message.role === "user";
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text color={isUser ? "green" : "cyan"}>{isUser ? "you" : "assistant"}</Text>
      {message.attachments.map((attachment) => (
        <Text key={attachment.id} color="magenta">
          [image] {attachment.url}
        </Text>
      ))}
      {message.content ? <Text>{message.content}</Text> : null}
      {message.state.kind === "streaming" ? (
        <Text color="yellow">
          <Spinner type="dots" />
        </Text>
      ) : null}
      {message.state.kind === "stopped" ? <Text color="gray">(stopped)</Text> : null}
      {message.state.kind === "failed" ? (
        <Text color="red">failed: {message.state.reason ?? "unknown error"} (ctrl+r to retry)</Text>
      ) : null}
    </Box>
  );
}

function formatUsage(usage: UsageMetrics): string {
  const parts: string[] = [];
  if (usage.promptTokens !== undefined) {
    parts.push(`prompt ${usage.promptTokens}`);
  }
  if (usage.completionTokens !== undefined) {
    parts.push(`completion ${usage.completionTokens}`);
  }
  if (usage.totalTokens !== undefined) {
    parts.push(`total ${usage.totalTokens}`);
  }
  return `tokens: ${parts.join(" · ") || "n/a"}`;
}

export async function startChatApp(controller: ChatController): Promise<void> {
  const app = render(<ChatApp controller={controller} />, { exitOnCtrlC: false });
  await controller.loadModels();
  await app.waitUntilExit();
  controller.stopGeneration();
}
