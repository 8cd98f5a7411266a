/**
 * Tool Registry
 *
 * Exports all tools and the dispatcher the server calls.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ValidationError } from "../core/errors";
import { log } from "../core/logger";
import type { FlashcardService } from "../service/flashcard-service";
import { createCardTool, deleteCardTool, listCardsTool, updateCardTool } from "./card-tools";
import { manageDueDatesTool } from "./due-date-tools";
import { errorResult, type ToolEntry } from "./results";
import { analyzeLearningTool, getDueCardTool, getStatsTool, submitReviewTool } from "./review-tools";

export { allResources, readResource } from "./resources";
export type { ToolEntry } from "./results";

/**
 * All available tools for registration
 */
export const allTools: ToolEntry[] = [
  getDueCardTool,
  submitReviewTool,
  createCardTool,
  updateCardTool,
  deleteCardTool,
  listCardsTool,
  analyzeLearningTool,
  getStatsTool,
  manageDueDatesTool,
];

/** Never throws: failures come back as `isError` results. */
export async function callTool(service: FlashcardService, name: string, args: unknown): Promise<CallToolResult> {
  const entry = allTools.find((t) => t.definition.name === name);
  if (!entry) return errorResult(new ValidationError(`Unknown tool: ${name}`), name);

  log.debug(`Tool call ${name}`);
  try {
    return await entry.handler(service, args);
  } catch (e) {
    log.debug(`Tool ${name} failed:`, e);
    return errorResult(e, name);
  }
}
