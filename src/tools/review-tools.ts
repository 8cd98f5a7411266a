/**
 * @file src/tools/review-tools.ts
 * @summary Study-loop tools: get_due_card picks the next card, submit_review grades it,
 * get_stats and help_analyze_learning report on progress.
 *
 * @exports
 *   - getDueCardTool / submitReviewTool / getStatsTool / analyzeLearningTool — registry entries
 */

import { encodeCard, encodeReview } from "../core/store-codec";
import { jsonResult, presentAnalysis, presentStats, type ToolEntry } from "./results";
import { emptyArgs, getDueCardArgs, parseToolArgs, submitReviewArgs } from "./schemas";

export const getDueCardTool: ToolEntry = {
  definition: {
    name: "get_due_card",
    description: "Get the next flashcard due for review, optionally restricted to cards carrying all given tags",
    inputSchema: {
      type: "object",
      properties: {
        tags: {
          type: "array",
          items: { type: "string" },
          description: "Only consider cards that have every one of these tags",
        },
      },
    },
  },
  handler: async (service, raw) => {
    const args = parseToolArgs("get_due_card", getDueCardArgs, raw);
    const { card, stats } = await service.getDueCard(args.tags);
    return jsonResult({ card: encodeCard(card), stats: presentStats(stats) });
  },
};

export const submitReviewTool: ToolEntry = {
  definition: {
    name: "submit_review",
    description: "Submit a review for a flashcard",
    inputSchema: {
      type: "object",
      properties: {
        card_id: { type: "string", description: "The ID of the card being reviewed" },
        rating: { type: "number", description: "Rating from 1-4: Again=1, Hard=2, Good=3, Easy=4" },
        answer: { type: "string", description: "The answer provided by the user" },
      },
      required: ["card_id", "rating"],
    },
  },
  handler: async (service, raw) => {
    const args = parseToolArgs("submit_review", submitReviewArgs, raw);
    const { card, review } = await service.submitReview(args.card_id, args.rating, args.answer);
    return jsonResult({
      success: true,
      message: `Review submitted successfully for card ${card.id}`,
      card: encodeCard(card),
      review: encodeReview(review),
    });
  },
};

export const getStatsTool: ToolEntry = {
  definition: {
    name: "get_stats",
    description: "Get totals, due count, today's reviews and today's retention rate",
    inputSchema: { type: "object", properties: {} },
  },
  handler: async (service, raw) => {
    parseToolArgs("get_stats", emptyArgs, raw);
    return jsonResult(presentStats(await service.getStats()));
  },
};

export const analyzeLearningTool: ToolEntry = {
  definition: {
    name: "help_analyze_learning",
    description: "Find the cards with the lowest average ratings and the tags they have in common",
    inputSchema: { type: "object", properties: {} },
  },
  handler: async (service, raw) => {
    parseToolArgs("help_analyze_learning", emptyArgs, raw);
    return jsonResult(presentAnalysis(await service.analyzeLearning()));
  },
};
