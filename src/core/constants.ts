/**
 * @file src/core/constants.ts
 * @summary Central constants and shared utilities. Defines the application identity, time
 * units, the scheduling priority table, and file-format constants. Also provides a generic
 * deepMerge utility used for settings hydration.
 *
 * @exports
 *   - APP_NAME / APP_VERSION — identity advertised to protocol clients
 *   - MS_HOUR / MS_DAY — milliseconds in one hour / day
 *   - STATE_BASE_PRIORITY — base review priority per FSRS state
 *   - OVERDUE_PRIORITY_RATE — priority growth per overdue day
 *   - MASTERED_RATING / CORRECT_RATING_MIN — rating thresholds used by stats
 *   - TEMP_FILE_SUFFIX — suffix of the sibling file written before the atomic rename
 *   - ZERO_TIME — timestamp written for absent times in the persisted file
 *   - DeepPartial — recursive partial used for settings overrides
 *   - deepMerge — recursively merge a partial object into a target
 */

import { State } from "ts-fsrs";
import { isPlainObject } from "./utils";

export const APP_NAME = "flashcards";
export const APP_VERSION = "1.0.0";

// ── Time ────────────────────────────────────────────────────────────
export const MS_HOUR = 60 * 60 * 1000;
/** Milliseconds in one day (24 × 60 × 60 × 1000). */
export const MS_DAY = 24 * MS_HOUR;

// ── Priority ────────────────────────────────────────────────────────
/** Learning states outrank review, review outranks new. */
export const STATE_BASE_PRIORITY: Record<State, number> = {
  [State.New]: 1.0,
  [State.Learning]: 3.0,
  [State.Review]: 2.0,
  [State.Relearning]: 3.0,
};

/** +10% priority per overdue day. */
export const OVERDUE_PRIORITY_RATE = 0.1;

// ── Ratings ─────────────────────────────────────────────────────────
export const MASTERED_RATING = 4;
export const CORRECT_RATING_MIN = 3;

// ── Persistence ─────────────────────────────────────────────────────
export const TEMP_FILE_SUFFIX = ".tmp";
export const ZERO_TIME = "0001-01-01T00:00:00Z";

/** Recursive partial: nested objects become optional key by key, arrays are replaced whole. */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export function deepMerge<T>(target: T, src: DeepPartial<T>): T {
  const out: Record<string, unknown> = isPlainObject(target) ? { ...target } : {};
  const patch: Record<string, unknown> = isPlainObject(src) ? src : {};
  for (const k of Object.keys(patch)) {
    const v = patch[k];
    if (v === undefined) continue;
    if (isPlainObject(v)) out[k] = deepMerge(out[k] || {}, v);
    else out[k] = v;
  }
  return out as T;
}
