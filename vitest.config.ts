import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/stream/sse-decoder.ts", "src/client/context-builder.ts", "src/client/chat-controller.ts"],
    },
  },
});
