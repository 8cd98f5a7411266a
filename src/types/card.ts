/**
 * @file src/types/card.ts
 * @summary Card record type. A card owns its content, its tag set and the scheduling state
 * the oracle maintains.
 *
 * @exports
 *   - CardRecord — persistent record for a single flashcard
 *   - CardPatch — partial content update accepted by the service
 */

import type { SchedulingState } from "./scheduler";

export type CardRecord = {
  /** Immutable once created. */
  id: string;
  front: string;
  back: string;
  createdAt: number;
  /** Matched exactly and case-sensitively; order carries no meaning. */
  tags: string[];
  lastReviewedAt?: number;
  fsrs: SchedulingState;
};

export type CardPatch = {
  front?: string;
  back?: string;
  tags?: string[];
};
