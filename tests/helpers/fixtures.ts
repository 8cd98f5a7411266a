// tests/helpers/fixtures.ts
// ---------------------------------------------------------------------------
// Shared factories for the test suite: card / review builders, a temp
// directory per test for the file store, a settable clock and a
// deterministic scheduling oracle that records what it was asked.
// ---------------------------------------------------------------------------

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { State } from "ts-fsrs";
import { MS_DAY } from "../../src/core/constants";
import type { CardRecord } from "../../src/types/card";
import type { ReviewLogEntry } from "../../src/types/review";
import type { ReviewRating, SchedulingOracle, SchedulingState } from "../../src/types/scheduler";

export const NOW = new Date(2026, 1, 6, 12, 0, 0).getTime(); // local noon, 6 Feb 2026

export function makeState(overrides: Partial<SchedulingState> = {}): SchedulingState {
  return {
    due: NOW,
    stability: 0,
    difficulty: 0,
    elapsedDays: 0,
    scheduledDays: 0,
    learningSteps: 0,
    reps: 0,
    lapses: 0,
    state: State.New,
    ...overrides,
  };
}

export function makeCard(id: string, overrides: Partial<Omit<CardRecord, "fsrs">> & { fsrs?: Partial<SchedulingState> } = {}): CardRecord {
  const { fsrs, ...rest } = overrides;
  return {
    id,
    front: `front ${id}`,
    back: `back ${id}`,
    createdAt: NOW,
    tags: [],
    ...rest,
    fsrs: makeState(fsrs),
  };
}

export function makeReview(id: string, cardId: string, overrides: Partial<ReviewLogEntry> = {}): ReviewLogEntry {
  return {
    id,
    cardId,
    rating: 3,
    timestamp: NOW,
    answer: "",
    scheduledDays: 1,
    elapsedDays: 0,
    state: State.Review,
    ...overrides,
  };
}

/** A clock tests can move. */
export class TestClock {
  constructor(public current: number = NOW) {}

  now = (): number => this.current;

  advance(ms: number) {
    this.current += ms;
  }
}

type OracleCall = { state: SchedulingState; rating: ReviewRating; now: number };

/**
 * Due moves `rating` days ahead; Again sends the card to Relearning,
 * anything else to Review.
 */
export class FakeOracle implements SchedulingOracle {
  readonly calls: OracleCall[] = [];

  advance(state: SchedulingState, rating: ReviewRating, now: number): SchedulingState {
    this.calls.push({ state: { ...state }, rating, now });
    return {
      ...state,
      due: now + rating * MS_DAY,
      scheduledDays: rating,
      reps: state.reps + 1,
      lapses: rating === 1 ? state.lapses + 1 : state.lapses,
      state: rating === 1 ? State.Relearning : State.Review,
      lastReview: now,
    };
  }
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "flashcards-test-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Lets queued promise callbacks and timers run. */
export function flush(): Promise<void> {
  return new Promise((r) => setTimeout(r, 0));
}
