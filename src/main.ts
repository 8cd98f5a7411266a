/**
 * @file src/main.ts
 * @summary Process entry point. Reads settings from flags and environment, loads the store
 * and serves the tools over stdio until the client disconnects. Any startup failure
 * (bad flags, unreadable or corrupt store file) exits with status 1.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./core/config";
import { errorMessage } from "./core/errors";
import { log } from "./core/logger";
import { createApp, createServer } from "./server";

async function main(): Promise<void> {
  const settings = loadConfig();
  log.setLevel(settings.logging.level);

  const { service } = await createApp(settings);
  const server = createServer(service, settings.server);

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down`);
    server.close().then(
      () => process.exit(0),
      (e: unknown) => {
        log.error("Error while closing server:", errorMessage(e));
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await server.connect(new StdioServerTransport());
  log.info(`${settings.server.name} ${settings.server.version} serving ${settings.storage.filePath} over stdio`);
}

main().catch((e: unknown) => {
  log.error("Startup failed:", errorMessage(e));
  process.exit(1);
});
