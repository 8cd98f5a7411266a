/**
 * @file src/types/review.ts
 * @summary Review log types. A ReviewLogEntry captures what happened when a card was graded,
 * including the scheduling snapshot the oracle produced. The log is append-only and keeps
 * entries for cards that were later deleted.
 *
 * @exports
 *   - ReviewLogEntry — type for a single entry in the review log
 */

import type { FsrsState, ReviewRating } from "./scheduler";

export type ReviewLogEntry = {
  id: string;
  /** Non-owning reference; the card may no longer exist. */
  cardId: string;
  rating: ReviewRating;
  timestamp: number;
  answer: string;
  scheduledDays: number;
  elapsedDays: number;
  state: FsrsState;
};
