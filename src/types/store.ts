/**
 * @file src/types/store.ts
 * @summary Store-level type definitions. Defines the DueDate record that ties a cohort tag
 * to a deadline, and the top-level StoreData shape that wraps all cards, the review log and
 * the due dates.
 *
 * @exports
 *   - DueDate — a test or deadline associated with a cohort tag
 *   - StoreData — root in-memory data structure behind the JSON file
 *   - StoreSnapshot — copy of cards and reviews taken under one read lock
 */

import type { CardRecord } from "./card";
import type { ReviewLogEntry } from "./review";

/**
 * A deadline linked to cards by tag string only; nothing checks that
 * any card carries the tag.
 */
export type DueDate = {
  id: string;
  /** User-facing name, e.g. "Biology Test". */
  topic: string;
  dueDate: number;
  tag: string;
};

export type StoreData = {
  cards: Record<string, CardRecord>;
  reviews: ReviewLogEntry[];
  dueDates: DueDate[];
  lastUpdated: number;
};

export type StoreSnapshot = {
  cards: CardRecord[];
  reviews: ReviewLogEntry[];
};
