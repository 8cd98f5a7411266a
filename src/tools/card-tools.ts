/**
 * @file src/tools/card-tools.ts
 * @summary Card CRUD tools: create_card, update_card, delete_card and list_cards.
 *
 * @exports
 *   - createCardTool / updateCardTool / deleteCardTool / listCardsTool — registry entries
 */

import { encodeCard } from "../core/store-codec";
import { jsonResult, presentStats, type ToolEntry } from "./results";
import { createCardArgs, deleteCardArgs, listCardsArgs, parseToolArgs, updateCardArgs } from "./schemas";

const tagsProperty = {
  type: "array",
  items: { type: "string" },
} as const;

export const createCardTool: ToolEntry = {
  definition: {
    name: "create_card",
    description: "Create a new flashcard",
    inputSchema: {
      type: "object",
      properties: {
        front: { type: "string", description: "The front text of the card" },
        back: { type: "string", description: "The back text of the card" },
        tags: { ...tagsProperty, description: "Tags for categorizing the card" },
        hour_offset: {
          type: "number",
          description: "Hours from now until the card is first due; negative makes it overdue",
        },
      },
      required: ["front", "back"],
    },
  },
  handler: async (service, raw) => {
    const args = parseToolArgs("create_card", createCardArgs, raw);
    const card = await service.createCard(args.front, args.back, args.tags ?? [], args.hour_offset);
    return jsonResult({ card: encodeCard(card) });
  },
};

export const updateCardTool: ToolEntry = {
  definition: {
    name: "update_card",
    description: "Update an existing flashcard; only the supplied fields change",
    inputSchema: {
      type: "object",
      properties: {
        card_id: { type: "string", description: "The ID of the card to update" },
        front: { type: "string", description: "The new front text of the card" },
        back: { type: "string", description: "The new back text of the card" },
        tags: { ...tagsProperty, description: "New tags for the card" },
      },
      required: ["card_id"],
    },
  },
  handler: async (service, raw) => {
    const args = parseToolArgs("update_card", updateCardArgs, raw);
    const card = await service.updateCard(args.card_id, { front: args.front, back: args.back, tags: args.tags });
    return jsonResult({
      success: true,
      message: `Card ${card.id} updated successfully`,
      card: encodeCard(card),
    });
  },
};

export const deleteCardTool: ToolEntry = {
  definition: {
    name: "delete_card",
    description: "Delete a flashcard; its review history is kept",
    inputSchema: {
      type: "object",
      properties: {
        card_id: { type: "string", description: "The ID of the card to delete" },
      },
      required: ["card_id"],
    },
  },
  handler: async (service, raw) => {
    const args = parseToolArgs("delete_card", deleteCardArgs, raw);
    await service.deleteCard(args.card_id);
    return jsonResult({ success: true, message: `Card ${args.card_id} was successfully deleted` });
  },
};

export const listCardsTool: ToolEntry = {
  definition: {
    name: "list_cards",
    description: "List all flashcards, optionally filtered to cards carrying any of the given tags",
    inputSchema: {
      type: "object",
      properties: {
        tags: { ...tagsProperty, description: "Filter cards by tags" },
        include_stats: { type: "boolean", description: "Include statistics in the response" },
      },
    },
  },
  handler: async (service, raw) => {
    const args = parseToolArgs("list_cards", listCardsArgs, raw);
    const listing = await service.listCards(args.tags, args.include_stats ?? false);
    return jsonResult({
      cards: listing.cards.map(encodeCard),
      ...(listing.stats ? { stats: presentStats(listing.stats) } : {}),
    });
  },
};
