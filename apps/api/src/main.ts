// apps/api/src/main.ts
import { loadConfig } from "./common/config";
import { logger } from "./common/logger";
import { createHandler } from "./index";
import { InventoryStore } from "./inventory/store";
import { startServer } from "./server";

const config = loadConfig();
const store = new InventoryStore();
const server = startServer(config, createHandler({ store, config }));

function shutdown(signal: string) {
  logger.info({ service: config.serviceName }, "shutting down", { signal });
  server.close(err => {
    if (err) {
      logger.error({ service: config.serviceName }, "close failed", { error: err.message });
      process.exitCode = 1;
    }
  });
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
