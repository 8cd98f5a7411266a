/**
 * @file src/scheduler/due-selector.ts
 * @summary Picks the single most urgent due card. Cards are first narrowed to those carrying
 * ALL requested tags (unlike the store's listing, which matches ANY tag), then to those due
 * now, then ranked by review priority. Ties go to the lexicographically smallest id. Every
 * outcome, success or failure, carries the stats computed over all cards.
 *
 * @exports
 *   - hasAllTags — AND tag predicate used for selection
 *   - DueCardSelection — chosen card plus whole-store stats
 *   - selectDueCard — choose the next card or throw a selection error
 */

import type { CardRecord } from "../types/card";
import type { ReviewLogEntry } from "../types/review";
import type { CardStats } from "../types/stats";
import { NoCardsDueError, NoCardsDueWithTagsError, NoCardsMatchingTagsError } from "../core/errors";
import { computeStats } from "../reviewer/stats";
import { getReviewPriority, isDue } from "./scheduler";

export function hasAllTags(card: Pick<CardRecord, "tags">, required: readonly string[]): boolean {
  if (required.length === 0) return true;
  const own = new Set(card.tags);
  return required.every((t) => own.has(t));
}

export type DueCardSelection = {
  card: CardRecord;
  stats: CardStats;
};

export function selectDueCard(
  cards: readonly CardRecord[],
  reviews: readonly ReviewLogEntry[],
  tags: readonly string[] | undefined,
  now: number,
): DueCardSelection {
  const stats = computeStats(cards, reviews, now);
  const required = tags ?? [];
  const filtered = required.length ? cards.filter((c) => hasAllTags(c, required)) : cards;

  if (required.length && filtered.length === 0) {
    throw new NoCardsMatchingTagsError(stats, [...required]);
  }

  let best: CardRecord | undefined;
  let bestPriority = -Infinity;
  for (const card of filtered) {
    if (!isDue(card.fsrs, now)) continue;
    const priority = getReviewPriority(card.fsrs, now);
    if (!best || priority > bestPriority || (priority === bestPriority && card.id < best.id)) {
      best = card;
      bestPriority = priority;
    }
  }

  if (!best) {
    throw required.length ? new NoCardsDueWithTagsError(stats, [...required]) : new NoCardsDueError(stats);
  }

  return { card: best, stats };
}
