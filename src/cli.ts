import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { SupabaseAttachmentUploader } from "./client/attachments.js";
import { ChatController } from "./client/chat-controller.js";
import { ChatService } from "./client/chat-service.js";
import { FileChatHistoryStore, MemoryChatHistoryStore } from "./client/history-store.js";
import { loadClientConfig, loadServerConfig, type ClientConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { ModelRegistry } from "./models/registry.js";
import { SupabaseModelConfigSource } from "./models/supabase.js";
import { createChatProxyHandler } from "./proxy/handler.js";
import { serveChatProxy } from "./proxy/serve.js";
import { createSupabaseProxyDeps } from "./proxy/supabase-deps.js";
import { startChatApp } from "./tui/chat-app.js";

const argv = process.argv.slice(2);

void main(argv).catch((error) => {
  console.error(`[roster-chat] fatal: ${errorMessage(error)}`);
  process.exitCode = 1;
});

async function main(args: string[]): Promise<void> {
  const first = (args[0] ?? "").trim().toLowerCase();

  if (!first || first === "chat" || first === "--no-history") {
    await runChat(loadClientConfig(), { keepHistory: !args.includes("--no-history") });
    return;
  }

  if (first === "serve") {
    await runServe();
    return;
  }

  if (first === "models") {
    await printModels(loadClientConfig());
    return;
  }

  console.error(`unknown subcommand: ${args[0]}`);
  console.error("usage:");
  console.error("  roster-chat          # start the terminal chat");
  console.error("  roster-chat chat     # same as above");
  console.error("  roster-chat chat --no-history   # keep this session's messages in memory only");
  console.error("  roster-chat serve    # run the chat proxy");
  console.error("  roster-chat models   # list active models");
  process.exitCode = 1;
}

async function runServe(): Promise<void> {
  const config = loadServerConfig();
  const handler = createChatProxyHandler(createSupabaseProxyDeps(config));
  const server = await serveChatProxy(handler, { host: config.host, port: config.port });

  await new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });
  await server.close();
}

async function runChat(config: ClientConfig, options: { keepHistory: boolean }): Promise<void> {
  const client = createUserClient(config);
  const controller = new ChatController({
    models: new ModelRegistry(new SupabaseModelConfigSource(client)),
    transport: new ChatService({
      functionUrl: config.functionUrl,
      anonKey: config.anonKey,
      malformedChunks: config.malformedChunks,
    }),
    store: options.keepHistory ? new FileChatHistoryStore(config.dataDir) : new MemoryChatHistoryStore(),
    uploader: new SupabaseAttachmentUploader(client, config.uploadBucket),
    getAccessToken: () => config.accessToken,
    maxUserTurns: config.contextUserTurns,
  });
  await startChatApp(controller);
}

async function printModels(config: ClientConfig): Promise<void> {
  const registry = new ModelRegistry(new SupabaseModelConfigSource(createUserClient(config)));
  const models = await registry.listActiveModels();
  if (models.length === 0) {
    console.log("no active models");
    return;
  }
  for (const model of models) {
    console.log(`${model.ordering}  ${model.displayName}  ${model.modelIdentifier}  ${model.baseUrl}`);
  }
}

function createUserClient(config: ClientConfig): SupabaseClient {
  return createClient(config.supabaseUrl, config.anonKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: config.accessToken ? { headers: { Authorization: `Bearer ${config.accessToken}` } } : undefined,
  });
}
