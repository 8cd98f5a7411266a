/**
 * @file src/tools/results.ts
 * @summary Shapes service values into protocol responses. Records are presented in the same
 * snake_case shape they have on disk; aggregates get snake_case keys. Errors become
 * `isError` results carrying `{ error }`, plus the whole-store stats for selection failures.
 *
 * @exports
 *   - ToolHandler / ToolEntry — handler signature and registry entry
 *   - jsonResult — successful result with a JSON text body
 *   - errorResult — map a thrown value to an error result
 *   - presentStats / presentTagInfo / presentProgress / presentAnalysis — aggregate presenters
 */

import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import type { CardStats, DueDateProgressInfo, LearningAnalysis, TagInfo } from "../types/stats";
import { errorMessage, isFlashcardError, isSelectionError } from "../core/errors";
import { log } from "../core/logger";
import { encodeCard } from "../core/store-codec";
import type { FlashcardService } from "../service/flashcard-service";

export type ToolHandler = (service: FlashcardService, args: unknown) => Promise<CallToolResult>;

export type ToolEntry = {
  definition: Tool;
  handler: ToolHandler;
};

export function jsonResult(payload: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
}

export function errorResult(err: unknown, context: string): CallToolResult {
  let body: Record<string, unknown>;
  if (isSelectionError(err)) {
    body = { error: err.message, stats: presentStats(err.stats) };
  } else if (isFlashcardError(err)) {
    body = { error: err.message, code: err.code };
  } else {
    log.error(`Unexpected failure in ${context}:`, err);
    body = { error: `Internal error: ${errorMessage(err)}` };
  }
  return { ...jsonResult(body), isError: true };
}

export function presentStats(stats: CardStats) {
  return {
    total_cards: stats.totalCards,
    due_cards: stats.dueCards,
    reviews_today: stats.reviewsToday,
    retention_rate: stats.retentionRate,
  };
}

export function presentTagInfo(info: TagInfo) {
  return {
    tag: info.tag,
    card_count: info.cardCount,
    due_count: info.dueCount,
    total_cards: info.totalCards,
    due_cards: info.dueCards,
  };
}

export function presentProgress(p: DueDateProgressInfo) {
  return {
    id: p.id,
    topic: p.topic,
    due_date: p.dueDate,
    tag: p.tag,
    total_cards: p.totalCards,
    mastered_cards: p.masteredCards,
    progress_percent: p.progressPercent,
    days_remaining: p.daysRemaining,
    cards_left: p.cardsLeft,
    required_pace: p.requiredPace,
  };
}

export function presentAnalysis(a: LearningAnalysis) {
  return {
    low_scoring_cards: a.lowScoringCards.map((low) => ({
      card: encodeCard(low.card),
      reviews: low.reviews.map((r) => ({
        rating: r.rating,
        timestamp: new Date(r.timestamp).toISOString(),
        answer: r.answer,
      })),
      avg_rating: low.avgRating,
      review_count: low.reviewCount,
    })),
    common_tags: a.commonTags,
    total_reviews: a.totalReviews,
    stats: presentStats(a.stats),
  };
}
