/**
 * @file src/server.ts
 * @summary Composition root and protocol server. `createApp` builds the store, oracle and
 * service from settings and loads the backing file; `createServer` registers the tool and
 * resource handlers on a low-level MCP server. The transport is attached by the caller.
 *
 * @exports
 *   - FlashcardApp — the wired store and service
 *   - createApp — build and load everything behind the server
 *   - createServer — MCP server exposing the tools and resources
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { FlashcardSettings } from "./types/settings";
import type { SchedulingOracle } from "./types/scheduler";
import { log } from "./core/logger";
import { JsonStore } from "./core/store";
import { FsrsOracle } from "./scheduler/scheduler";
import { FlashcardService } from "./service/flashcard-service";
import { allResources, allTools, callTool, readResource } from "./tools";

export type FlashcardApp = {
  store: JsonStore;
  service: FlashcardService;
};

export async function createApp(
  settings: FlashcardSettings,
  overrides: { oracle?: SchedulingOracle; now?: () => number } = {},
): Promise<FlashcardApp> {
  const store = new JsonStore(settings.storage.filePath, { now: overrides.now });
  await store.load();
  const service = new FlashcardService({
    store,
    oracle: overrides.oracle ?? new FsrsOracle(settings.scheduling),
    now: overrides.now,
  });
  return { store, service };
}

export function createServer(service: FlashcardService, identity: FlashcardSettings["server"]): Server {
  const server = new Server(
    { name: identity.name, version: identity.version },
    { capabilities: { tools: {}, resources: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: allTools.map((t) => t.definition),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    callTool(service, request.params.name, request.params.arguments ?? {}),
  );

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: allResources.map((r) => r.resource),
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    log.debug(`Resource read ${request.params.uri}`);
    return readResource(service, request.params.uri);
  });

  return server;
}
