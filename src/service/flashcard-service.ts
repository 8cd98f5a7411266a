/**
 * @file src/service/flashcard-service.ts
 * @summary Facade the request layer talks to. Composes the store, the scheduling oracle, the
 * due-card selector, the review processor and the stats aggregator. Every mutation runs in
 * one exclusive store transaction that ends with a save; a failed save propagates as
 * StorageIOError and leaves the in-memory change in place.
 *
 * @exports
 *   - FlashcardServiceDeps — injected store, oracle and clock
 *   - CardListing — cards plus optional whole-store stats
 *   - NewDueDateInput / DueDateInputPatch — due-date arguments as the request layer sends them
 *   - buildDueDateTag — derive the cohort tag for a topic and date
 *   - FlashcardService — the facade
 */

import type { CardPatch, CardRecord } from "../types/card";
import type { ReviewLogEntry } from "../types/review";
import type { SchedulingOracle } from "../types/scheduler";
import type { CardStats, DueDateProgressInfo, LearningAnalysis, TagInfo } from "../types/stats";
import type { DueDate } from "../types/store";
import { MS_HOUR } from "../core/constants";
import { ValidationError } from "../core/errors";
import { log } from "../core/logger";
import type { JsonStore } from "../core/store";
import { formatIsoDate, parseIsoDate } from "../core/utils";
import { processReview, type ReviewOutcome } from "../reviewer/review-processor";
import {
  analyzeLearning,
  computeDueDateProgressView,
  computeStats,
  computeTagCounts,
} from "../reviewer/stats";
import { selectDueCard, type DueCardSelection } from "../scheduler/due-selector";

export type FlashcardServiceDeps = {
  store: JsonStore;
  oracle: SchedulingOracle;
  now?: () => number;
};

export type CardListing = {
  cards: CardRecord[];
  stats?: CardStats;
};

export type NewDueDateInput = {
  topic: string;
  /** YYYY-MM-DD */
  date: string;
  tag?: string;
};

export type DueDateInputPatch = {
  topic?: string;
  date?: string;
  tag?: string;
};

/** `test-<topic lowercased, spaces as dashes>-<YYYY-MM-DD>` */
export function buildDueDateTag(topic: string, date: string): string {
  return `test-${topic.replaceAll(" ", "-").toLowerCase()}-${date}`;
}

function requireDate(date: string): number {
  const ms = parseIsoDate(date);
  if (ms === undefined) throw new ValidationError(`Invalid date format: ${date}. Use YYYY-MM-DD.`);
  return ms;
}

function sameTagSet(a: readonly string[], b: readonly string[]): boolean {
  const sa = new Set(a);
  const sb = new Set(b);
  return sa.size === sb.size && [...sa].every((t) => sb.has(t));
}

export class FlashcardService {
  private readonly store: JsonStore;
  private readonly oracle: SchedulingOracle;
  private readonly now: () => number;

  constructor(deps: FlashcardServiceDeps) {
    this.store = deps.store;
    this.oracle = deps.oracle;
    this.now = deps.now ?? Date.now;
  }

  // ── Cards ─────────────────────────────────────────────────────────

  /**
   * `hourOffset` moves the first due time relative to now, so a card can be
   * created already overdue (negative) or not yet due (positive).
   */
  createCard(front: string, back: string, tags: string[] = [], hourOffset?: number): Promise<CardRecord> {
    if (hourOffset !== undefined && !Number.isFinite(hourOffset)) {
      return Promise.reject(new ValidationError("hour_offset must be a finite number"));
    }

    return this.store.exclusive(async (tx) => {
      let card = tx.createCard(front, back, tags);
      if (hourOffset !== undefined) {
        card = { ...card, fsrs: { ...card.fsrs, due: this.now() + hourOffset * MS_HOUR } };
        tx.updateCard(card);
      }
      await tx.persist();
      log.debug(`Card ${card.id} created with ${card.tags.length} tag(s)`);
      return tx.getCard(card.id);
    });
  }

  getCard(id: string): Promise<CardRecord> {
    return this.store.getCard(id);
  }

  /** Only supplied fields change. Nothing is saved when nothing changed. */
  updateCard(id: string, patch: CardPatch): Promise<CardRecord> {
    return this.store.exclusive(async (tx) => {
      const card = tx.getCard(id);
      let changed = false;

      if (patch.front !== undefined && patch.front !== card.front) {
        card.front = patch.front;
        changed = true;
      }
      if (patch.back !== undefined && patch.back !== card.back) {
        card.back = patch.back;
        changed = true;
      }
      if (patch.tags !== undefined && !sameTagSet(patch.tags, card.tags)) {
        card.tags = patch.tags;
        changed = true;
      }

      if (!changed) return card;

      tx.updateCard(card);
      await tx.persist();
      return tx.getCard(id);
    });
  }

  deleteCard(id: string): Promise<void> {
    return this.store.exclusive(async (tx) => {
      tx.deleteCard(id);
      await tx.persist();
    });
  }

  /** Cards carrying ANY of `tags`; stats always cover every card. */
  listCards(tags?: string[], includeStats = false): Promise<CardListing> {
    return this.store.read((view) => {
      const cards = view.listCards(tags);
      if (!includeStats) return { cards };
      const snap = view.snapshot();
      return { cards, stats: computeStats(snap.cards, snap.reviews, this.now()) };
    });
  }

  getCardReviews(cardId: string): Promise<ReviewLogEntry[]> {
    return this.store.getCardReviews(cardId);
  }

  // ── Reviewing ─────────────────────────────────────────────────────

  submitReview(cardId: string, rating: number, answer?: string): Promise<ReviewOutcome> {
    return processReview(this.store, this.oracle, { cardId, rating, answer }, this.now());
  }

  /** Most urgent due card carrying ALL of `tags`. */
  async getDueCard(tags?: string[]): Promise<DueCardSelection> {
    const snap = await this.store.snapshot();
    return selectDueCard(snap.cards, snap.reviews, tags, this.now());
  }

  // ── Aggregates ────────────────────────────────────────────────────

  async getStats(): Promise<CardStats> {
    const snap = await this.store.snapshot();
    return computeStats(snap.cards, snap.reviews, this.now());
  }

  async getTags(): Promise<TagInfo[]> {
    const snap = await this.store.snapshot();
    return computeTagCounts(snap.cards, this.now());
  }

  analyzeLearning(): Promise<LearningAnalysis> {
    return this.store.read((view) => {
      const snap = view.snapshot();
      return analyzeLearning(view.listCards(), snap.reviews, this.now());
    });
  }

  // ── Due dates ─────────────────────────────────────────────────────

  createDueDate(input: NewDueDateInput): Promise<DueDate> {
    const topic = input.topic.trim();
    if (!topic || !input.date.trim()) {
      return Promise.reject(new ValidationError("Missing required parameters for create: topic, date (YYYY-MM-DD)"));
    }

    let dueDate: number;
    try {
      dueDate = requireDate(input.date);
    } catch (e) {
      return Promise.reject(e);
    }
    const tag = input.tag?.trim() || buildDueDateTag(input.topic, formatIsoDate(dueDate));

    return this.store.exclusive(async (tx) => {
      const created = tx.addDueDate({ topic: input.topic, dueDate, tag });
      await tx.persist();
      log.debug(`Due date ${created.id} created for tag ${tag}`);
      return created;
    });
  }

  listDueDates(): Promise<DueDate[]> {
    return this.store.listDueDates();
  }

  /** Empty strings leave the corresponding field unchanged. */
  updateDueDate(id: string, patch: DueDateInputPatch): Promise<DueDate> {
    let dueDate: number | undefined;
    try {
      dueDate = patch.date ? requireDate(patch.date) : undefined;
    } catch (e) {
      return Promise.reject(e);
    }

    return this.store.exclusive(async (tx) => {
      const existing = tx.getDueDate(id);
      const updated: DueDate = {
        ...existing,
        topic: patch.topic || existing.topic,
        dueDate: dueDate ?? existing.dueDate,
        tag: patch.tag || existing.tag,
      };
      tx.updateDueDate(updated);
      await tx.persist();
      return updated;
    });
  }

  deleteDueDate(id: string): Promise<void> {
    return this.store.exclusive(async (tx) => {
      tx.deleteDueDate(id);
      await tx.persist();
    });
  }

  getDueDateProgress(): Promise<DueDateProgressInfo[]> {
    return this.store.read((view) => {
      const snap = view.snapshot();
      return computeDueDateProgressView(view.listDueDates(), snap.cards, snap.reviews, this.now());
    });
  }
}
