/**
 * @file src/tools/resources.ts
 * @summary Read-only JSON resources: `available-tags` (card and due counts per tag) and
 * `due-date-progress` (mastery and required pace for each upcoming due date).
 *
 * @exports
 *   - ResourceEntry — resource descriptor plus its reader
 *   - allResources — every resource the server lists
 *   - readResource — read one resource by URI
 */

import type { ReadResourceResult, Resource } from "@modelcontextprotocol/sdk/types.js";
import { NotFoundError } from "../core/errors";
import type { FlashcardService } from "../service/flashcard-service";
import { presentProgress, presentTagInfo } from "./results";

export type ResourceEntry = {
  resource: Resource;
  read: (service: FlashcardService) => Promise<unknown>;
};

export const allResources: ResourceEntry[] = [
  {
    resource: {
      uri: "available-tags",
      name: "Available Tags",
      description: "Every tag in use, with how many cards carry it and how many of those are due",
      mimeType: "application/json",
    },
    read: async (service) => (await service.getTags()).map(presentTagInfo),
  },
  {
    resource: {
      uri: "due-date-progress",
      name: "Due Date Progress",
      description: "Progress towards each upcoming due date and the pace needed to finish in time",
      mimeType: "application/json",
    },
    read: async (service) => (await service.getDueDateProgress()).map(presentProgress),
  },
];

export async function readResource(service: FlashcardService, uri: string): Promise<ReadResourceResult> {
  const entry = allResources.find((r) => r.resource.uri === uri);
  if (!entry) throw new NotFoundError("resource", uri);
  const body = await entry.read(service);
  return {
    contents: [{ uri, mimeType: "application/json", text: JSON.stringify(body, null, 2) }],
  };
}
