import http from "node:http";
import { errorMessage } from "../errors.js";
import type { ChatProxyHandler } from "./handler.js";

export type ServeOptions = {
  host: string;
  port: number;
  path?: string;
  log?: (message: string) => void;
};

/** Runs a fetch-style handler on a Node HTTP server until the returned close function is called. */
export async function serveChatProxy(
  handler: ChatProxyHandler,
  options: ServeOptions,
): Promise<{ url: string; close: () => Promise<void> }> {
  const log = options.log ?? ((message: string) => console.error(`[roster-chat] ${message}`));
  const routePath = options.path ?? "/functions/v1/ai-chat";

  const server = http.createServer((req, res) => {
    void dispatch(handler, routePath, req, res, log).catch((error) => {
      log(`request failed: ${errorMessage(error)}`);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "text/plain" });
      }
      res.end();
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address ? address.port : options.port;
  const url = `http://${options.host}:${port}${routePath}`;
  log(`chat proxy listening on ${url}`);

  return {
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      }),
  };
}

async function dispatch(
  handler: ChatProxyHandler,
  routePath: string,
  req: http.IncomingMessage,
  res: http.ServerResponse,
  log: (message: string) => void,
): Promise<void> {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  if (url.pathname !== routePath) {
    res.writeHead(404, { "Content-Type": "text/plain" });
    res.end("not found");
    return;
  }

  // Watch the socket before the handler runs: the client may leave during auth or the upstream open.
  let disconnected = false;
  let cancelBody: (() => void) | null = null;
  res.once("close", () => {
    if (res.writableFinished) {
      return;
    }
    disconnected = true;
    cancelBody?.();
  });

  const response = await handler(await toFetchRequest(url, req));
  const body = response.body;

  if (disconnected) {
    await body?.cancel().catch((error: unknown) => {
      log(`response cancel failed: ${errorMessage(error)}`);
    });
    return;
  }

  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  res.writeHead(response.status, headers);

  if (!body) {
    res.end();
    return;
  }

  const reader = body.getReader();
  cancelBody = () => {
    reader.cancel().catch((error: unknown) => {
      log(`response cancel failed: ${errorMessage(error)}`);
    });
  };

  try {
    while (!disconnected) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      if (!res.write(value)) {
        await waitForDrain(res);
      }
    }
    res.end();
  } catch (error) {
    res.destroy(error instanceof Error ? error : new Error(errorMessage(error)));
  }
}

function waitForDrain(res: http.ServerResponse): Promise<void> {
  return new Promise((resolve) => {
    const settle = () => {
      res.off("drain", settle);
      res.off("close", settle);
      resolve();
    };
    res.once("drain", settle);
    res.once("close", settle);
  });
}

async function toFetchRequest(url: URL, req: http.IncomingMessage): Promise<Request> {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        headers.append(key, item);
      }
    } else if (typeof value === "string") {
      headers.set(key, value);
    }
  }

  const method = req.method ?? "GET";
  if (method === "GET" || method === "HEAD") {
    return new Request(url, { method, headers });
  }

  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return new Request(url, { method, headers, body: Buffer.concat(chunks).toString("utf8") });
}
