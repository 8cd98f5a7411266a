// src/scheduler/scheduler.ts
// ---------------------------------------------------------------------------
// FSRS spaced-repetition scheduler — wraps ts-fsrs behind the SchedulingOracle
// interface, and provides the due predicate and the review-priority function
// the due-card selector ranks cards with.
//
// Type definitions (SchedulingState, SchedulerSettings, etc.) live in
// src/types/scheduler.ts; this file re-exports them for convenience.
// ---------------------------------------------------------------------------

export type { SchedulingState, SchedulerSettings, ReviewRating, SchedulingOracle } from "../types/scheduler";
import type { ReviewRating, SchedulerSettings, SchedulingOracle, SchedulingState } from "../types/scheduler";

import { fsrs, generatorParameters, Rating, State, type Card as FsrsCard, type FSRS, type Grade } from "ts-fsrs";
import { MS_DAY, OVERDUE_PRIORITY_RATE, STATE_BASE_PRIORITY } from "../core/constants";
import { clamp } from "../core/utils";

// --------------------
// FSRS parameters
// --------------------

type FsrsParams = ReturnType<typeof generatorParameters>;

function minutesToStepUnit(m: number): `${number}m` | `${number}h` | `${number}d` {
  const mm = Math.max(1, Math.round(m));
  if (mm % 1440 === 0) return `${mm / 1440}d`;
  if (mm % 60 === 0) return `${mm / 60}h`;
  return `${mm}m`;
}

export function buildFsrsParams(cfg: SchedulerSettings): FsrsParams {
  const learning = cfg.learningStepsMinutes.map(minutesToStepUnit);
  const relearning = cfg.relearningStepsMinutes.length
    ? cfg.relearningStepsMinutes.map(minutesToStepUnit)
    : [learning.length ? learning[0] : "10m"];

  return generatorParameters({
    request_retention: clamp(Number(cfg.requestRetention) || 0.9, 0.8, 0.97),
    maximum_interval: Math.max(1, Math.floor(cfg.maximumIntervalDays)),
    enable_fuzz: false,
    enable_short_term: true,
    learning_steps: learning.length ? learning : ["10m"],
    relearning_steps: relearning,
  });
}

// --------------------
// Mapping between SchedulingState and ts-fsrs Card
// --------------------

function toFsrsCard(s: SchedulingState, nowMs: number): FsrsCard {
  // Never allow last_review in the future; New cards carry no history.
  const last_review =
    s.lastReview !== undefined && s.lastReview <= nowMs && s.state !== State.New
      ? new Date(s.lastReview)
      : undefined;

  return {
    due: new Date(s.due),
    stability: Math.max(0, s.stability),
    difficulty: s.difficulty,
    elapsed_days: Math.max(0, Math.floor(s.elapsedDays)),
    scheduled_days: s.state === State.New ? 0 : Math.max(0, Math.floor(s.scheduledDays)),
    learning_steps: Math.max(0, s.learningSteps),
    reps: Math.max(0, s.reps),
    lapses: Math.max(0, s.lapses),
    state: s.state,
    last_review,
  };
}

function fromFsrsCard(card: FsrsCard): SchedulingState {
  return {
    due: card.due.getTime(),
    stability: card.stability,
    difficulty: card.difficulty,
    elapsedDays: Math.max(0, Math.floor(card.elapsed_days)),
    scheduledDays: Math.max(0, Math.floor(card.scheduled_days)),
    learningSteps: Math.max(0, card.learning_steps || 0),
    reps: Math.max(0, card.reps || 0),
    lapses: Math.max(0, card.lapses || 0),
    state: card.state,
    lastReview: card.last_review ? card.last_review.getTime() : undefined,
  };
}

function mapRating(r: ReviewRating): Grade {
  switch (r) {
    case 1:
      return Rating.Again;
    case 2:
      return Rating.Hard;
    case 3:
      return Rating.Good;
    case 4:
      return Rating.Easy;
  }
}

/** Production oracle: ts-fsrs with parameters taken from settings. */
export class FsrsOracle implements SchedulingOracle {
  private readonly engine: FSRS;

  constructor(cfg: SchedulerSettings) {
    this.engine = fsrs(buildFsrsParams(cfg));
  }

  advance(state: SchedulingState, rating: ReviewRating, now: number): SchedulingState {
    const result = this.engine.next(toFsrsCard(state, now), new Date(now), mapRating(rating));
    return fromFsrsCard(result.card);
  }
}

// --------------------
// Due predicate & priority
// --------------------

export function isDue(state: Pick<SchedulingState, "due">, now: number): boolean {
  return state.due <= now;
}

/**
 * Higher means more urgent. Overdue cards gain 10% per day (fractional);
 * cards not yet due are damped by `1 + daysToDue`.
 */
export function getReviewPriority(state: Pick<SchedulingState, "due" | "state">, now: number): number {
  const base = STATE_BASE_PRIORITY[state.state];
  if (now >= state.due) {
    const overdueDays = (now - state.due) / MS_DAY;
    return base * (1 + overdueDays * OVERDUE_PRIORITY_RATE);
  }
  const daysToDue = (state.due - now) / MS_DAY;
  return base / (1 + daysToDue);
}
