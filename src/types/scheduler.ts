/**
 * @file src/types/scheduler.ts
 * @summary Scheduler type definitions for the FSRS-based spaced-repetition engine. Defines
 * the per-card scheduling state (SchedulingState), the four-button rating values, the
 * scheduler settings that build the FSRS parameters, and the SchedulingOracle interface
 * the review processor consumes.
 *
 * @exports
 *   - FsrsState — re-export of the ts-fsrs State enum (New / Learning / Review / Relearning)
 *   - SchedulingState — scheduling record embedded in every card
 *   - ReviewRating — four-button rating values (1 = again … 4 = easy)
 *   - SchedulerSettings — FSRS scheduler configuration (steps, retention target, interval cap)
 *   - SchedulingOracle — injected forgetting-curve algorithm with a single `advance` operation
 */

import { State } from "ts-fsrs";

export { State as FsrsState };

/**
 * Scheduling state for a single card.
 *
 * Replaced wholesale by the oracle whenever the card is reviewed.
 * Timestamps are epoch ms.
 */
export type SchedulingState = {
  /** Next due timestamp. */
  due: number;

  // ── FSRS memory model ─────────────────────────────────────────────────
  stability: number;
  difficulty: number;

  /** Whole days between the previous review and the one that produced this state. */
  elapsedDays: number;
  /** FSRS scheduled interval in days. */
  scheduledDays: number;
  /** Current position in the learning/relearning step sequence. */
  learningSteps: number;

  /** Total number of reviews. */
  reps: number;
  /** Number of times the card lapsed back to relearning. */
  lapses: number;

  state: State;
  lastReview?: number;
};

/** Again = 1, Hard = 2, Good = 3, Easy = 4. */
export type ReviewRating = 1 | 2 | 3 | 4;

/**
 * Settings that control the FSRS scheduler behaviour.
 * Stored inside `FlashcardSettings.scheduling`.
 */
export type SchedulerSettings = {
  learningStepsMinutes: number[];
  relearningStepsMinutes: number[];
  /** Target recall probability at review time (e.g. 0.90). */
  requestRetention: number;
  maximumIntervalDays: number;
};

/**
 * External forgetting-curve algorithm. Pure and deterministic: the same
 * inputs always produce the same, complete next state.
 */
export interface SchedulingOracle {
  advance(state: SchedulingState, rating: ReviewRating, now: number): SchedulingState;
}
