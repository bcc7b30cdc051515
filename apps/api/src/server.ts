// apps/api/src/server.ts
// Serves the API Gateway handler over node:http for local and container runs.

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { AppConfig } from "./common/config";
import { errorMessage } from "./common/errors";
import { logger } from "./common/logger";
import type { ApiHandler } from "./index";
import { toApiEvent } from "./shared/event";

function readRequestBody(req: IncomingMessage): Promise<string | undefined> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(chunks.length ? Buffer.concat(chunks).toString("utf8") : undefined));
    req.on("error", reject);
  });
}

function flatHeaders(req: IncomingMessage): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [k, v] of Object.entries(req.headers)) {
    out[k] = Array.isArray(v) ? v.join(",") : v;
  }
  return out;
}

async function serve(handler: ApiHandler, req: IncomingMessage, res: ServerResponse) {
  const body = await readRequestBody(req);
  const event = toApiEvent({
    method: req.method ?? "GET",
    url: req.url ?? "/",
    headers: flatHeaders(req),
    body,
    sourceIp: req.socket.remoteAddress,
  });
  const result = await handler(event);
  res.writeHead(result.statusCode, result.headers);
  res.end(result.body);
}

export function startServer(config: AppConfig, handler: ApiHandler): Server {
  const ctx = { service: config.serviceName };
  const server = createServer((req, res) => {
    serve(handler, req, res).catch((err: unknown) => {
      logger.error(ctx, "request failed", { error: errorMessage(err), route: req.url, method: req.method });
      if (!res.headersSent) res.writeHead(500, { "content-type": "application/json" });
      res.end(JSON.stringify({ code: "internal_error", message: "Internal server error" }));
    });
  });
  server.listen(config.port, config.host, () => {
    logger.info(ctx, "listening", { host: config.host, port: config.port, env: config.appEnv });
  });
  return server;
}
