/**
 * @file src/core/utils.ts
 * @summary Generic utility functions shared across the project. Provides numeric clamping,
 * positive-number-array sanitisation, deep-clone, plain-object type guard, and the local
 * calendar-day helpers used by stats and due-date progress.
 *
 * @exports
 *   - clamp              — clamp a number between lo and hi
 *   - cleanPositiveNumberArray — sanitise an unknown value into a positive number array
 *   - clonePlain          — deep-clone a value via structuredClone
 *   - isPlainObject       — type guard for Record<string, unknown>
 *   - startOfLocalDayMs   — epoch ms of local midnight for the day containing `ms`
 *   - parseIsoDate        — YYYY-MM-DD to epoch ms at UTC midnight
 *   - formatIsoDate       — epoch ms to its UTC YYYY-MM-DD
 *   - localDayOfUtcDate   — local midnight of a UTC calendar date
 */

/** Clamp `n` between `lo` and `hi` (inclusive). */
export function clamp(n: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, n));
}

/**
 * Coerce an unknown value into an array of positive finite numbers.
 * Returns `fallback` if the result would be empty.
 */
export function cleanPositiveNumberArray(v: unknown, fallback: number[]): number[] {
  const arr = Array.isArray(v) ? v : [];
  const out = arr.map((x) => Number(x)).filter((n) => Number.isFinite(n) && n > 0);
  return out.length ? out : fallback;
}

/** Deep-clone a plain JSON-safe value. */
export function clonePlain<T>(x: T): T {
  return structuredClone(x);
}

/** Type guard: returns true if `v` is a non-null, non-array object. */
export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

export function startOfLocalDayMs(ms: number): number {
  const d = new Date(ms);
  d.setHours(0, 0, 0, 0);
  return d.getTime();
}

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Parses a YYYY-MM-DD calendar date to UTC midnight; undefined when malformed or impossible. */
export function parseIsoDate(s: string): number | undefined {
  const m = ISO_DATE_RE.exec(s.trim());
  if (!m) return undefined;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const ms = Date.UTC(y, mo - 1, d);
  const back = new Date(ms);
  if (back.getUTCFullYear() !== y || back.getUTCMonth() !== mo - 1 || back.getUTCDate() !== d) return undefined;
  return ms;
}

/** YYYY-MM-DD of the UTC calendar day containing `ms`. */
export function formatIsoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/** Local midnight of the calendar date that `ms` falls on in UTC. */
export function localDayOfUtcDate(ms: number): number {
  const d = new Date(ms);
  return new Date(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()).getTime();
}
