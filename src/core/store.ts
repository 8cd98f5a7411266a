/**
 * @file src/core/store.ts
 * @summary Persistent JSON data store. Holds every card, the append-only review log and the
 * due dates in memory behind one reader/writer lock, and mirrors them to a single JSON file
 * with an atomic temp-file-then-rename save. Mutations never save on their own; callers
 * persist explicitly, either through `save()` or from inside an `exclusive()` transaction.
 *
 * @exports
 *   - defaultStore — factory function returning a fresh, empty StoreData object
 *   - StoreReader — read-only synchronous view used inside `read()`
 *   - StoreTransaction — synchronous read/write view used inside `exclusive()`
 *   - NewReview / NewDueDate — inputs accepted by addReview / addDueDate
 *   - JsonStoreOptions — constructor options (clock)
 *   - JsonStore — the lock-guarded store with CRUD, snapshot, load and save
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { State } from "ts-fsrs";
import { ZodError } from "zod";
import type { CardRecord } from "../types/card";
import type { ReviewLogEntry } from "../types/review";
import type { DueDate, StoreData, StoreSnapshot } from "../types/store";
import { TEMP_FILE_SUFFIX } from "./constants";
import { NotFoundError, StorageIOError, ValidationError } from "./errors";
import { generateUniqueId } from "./ids";
import { log } from "./logger";
import { ReadWriteLock } from "./rw-lock";
import { decodeStore, encodeStore, formatStoreIssues } from "./store-codec";
import { clonePlain } from "./utils";

export function defaultStore(): StoreData {
  return {
    cards: {},
    reviews: [],
    dueDates: [],
    lastUpdated: 0,
  };
}

export type NewReview = Omit<ReviewLogEntry, "id"> & { id?: string };
export type NewDueDate = Omit<DueDate, "id"> & { id?: string };

export type StoreReader = Pick<
  StoreTransaction,
  "getCard" | "listCards" | "getCardReviews" | "listDueDates" | "getDueDate" | "snapshot"
>;

/**
 * The store's operations without locking, as seen from inside `exclusive()`.
 * Values passed in and out are copies.
 */
export interface StoreTransaction {
  createCard(front: string, back: string, tags: string[]): CardRecord;
  getCard(id: string): CardRecord;
  updateCard(card: CardRecord): void;
  deleteCard(id: string): void;
  listCards(tags?: string[]): CardRecord[];

  addReview(review: NewReview): ReviewLogEntry;
  getCardReviews(cardId: string): ReviewLogEntry[];

  addDueDate(dueDate: NewDueDate): DueDate;
  listDueDates(): DueDate[];
  getDueDate(id: string): DueDate;
  updateDueDate(dueDate: DueDate): void;
  deleteDueDate(id: string): void;

  snapshot(): StoreSnapshot;
  /** Writes the current state to disk. The caller already holds the write lock. */
  persist(): Promise<void>;
}

export type JsonStoreOptions = {
  /** Clock used for creation and modification times. Defaults to Date.now. */
  now?: () => number;
};

function uniqueTags(tags: readonly string[]): string[] {
  return Array.from(new Set(tags));
}

function byCreatedThenId(a: CardRecord, b: CardRecord): number {
  if (a.createdAt !== b.createdAt) return a.createdAt - b.createdAt;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function isErrno(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}

// --------------------
// JsonStore
// --------------------

export class JsonStore {
  readonly filePath: string;
  private data: StoreData = defaultStore();
  private readonly lock = new ReadWriteLock();
  private readonly now: () => number;
  private readonly tx: StoreTransaction;

  constructor(filePath: string, options: JsonStoreOptions = {}) {
    this.filePath = filePath;
    this.now = options.now ?? Date.now;
    this.tx = this.createTransaction();
  }

  // ── Cards ─────────────────────────────────────────────────────────

  createCard(front: string, back: string, tags: string[] = []): Promise<CardRecord> {
    return this.lock.write(() => this.tx.createCard(front, back, tags));
  }

  getCard(id: string): Promise<CardRecord> {
    return this.lock.read(() => this.tx.getCard(id));
  }

  updateCard(card: CardRecord): Promise<void> {
    return this.lock.write(() => this.tx.updateCard(card));
  }

  deleteCard(id: string): Promise<void> {
    return this.lock.write(() => this.tx.deleteCard(id));
  }

  /** Cards carrying ANY of `tags`; every card when the filter is absent or empty. */
  listCards(tags?: string[]): Promise<CardRecord[]> {
    return this.lock.read(() => this.tx.listCards(tags));
  }

  // ── Reviews ───────────────────────────────────────────────────────

  addReview(review: NewReview): Promise<ReviewLogEntry> {
    return this.lock.write(() => this.tx.addReview(review));
  }

  getCardReviews(cardId: string): Promise<ReviewLogEntry[]> {
    return this.lock.read(() => this.tx.getCardReviews(cardId));
  }

  // ── Due dates ─────────────────────────────────────────────────────

  addDueDate(dueDate: NewDueDate): Promise<DueDate> {
    return this.lock.write(() => this.tx.addDueDate(dueDate));
  }

  listDueDates(): Promise<DueDate[]> {
    return this.lock.read(() => this.tx.listDueDates());
  }

  getDueDate(id: string): Promise<DueDate> {
    return this.lock.read(() => this.tx.getDueDate(id));
  }

  updateDueDate(dueDate: DueDate): Promise<void> {
    return this.lock.write(() => this.tx.updateDueDate(dueDate));
  }

  deleteDueDate(id: string): Promise<void> {
    return this.lock.write(() => this.tx.deleteDueDate(id));
  }

  // ── Whole-store access ────────────────────────────────────────────

  /** Cards and reviews copied under a single read lock. */
  snapshot(): Promise<StoreSnapshot> {
    return this.lock.read(() => this.tx.snapshot());
  }

  /** Runs `fn` against a read-only view while holding shared access. */
  read<T>(fn: (view: StoreReader) => T | Promise<T>): Promise<T> {
    return this.lock.read(() => fn(this.tx));
  }

  /**
   * Runs `fn` while holding the write lock for its whole duration, including
   * any `persist()` it awaits. Nothing else reads or writes in between.
   */
  exclusive<T>(fn: (tx: StoreTransaction) => T | Promise<T>): Promise<T> {
    return this.lock.write(() => fn(this.tx));
  }

  // ── Persistence ───────────────────────────────────────────────────

  save(): Promise<void> {
    return this.lock.write(() => this.writeAtomic());
  }

  /**
   * Replaces the in-memory state with the file's content. A missing file is
   * created empty; a zero-byte file loads as empty. Unparseable content throws.
   */
  load(): Promise<void> {
    return this.lock.write(async () => {
      let text: string;
      try {
        text = await readFile(this.filePath, "utf8");
      } catch (e) {
        if (!isErrno(e, "ENOENT")) throw new StorageIOError("Failed to read store", this.filePath, e);
        log.info(`Store file ${this.filePath} not found; creating an empty store`);
        this.data = defaultStore();
        await this.writeAtomic();
        return;
      }

      if (text.trim() === "") {
        log.debug(`Store file ${this.filePath} is empty; starting with an empty store`);
        this.data = defaultStore();
        return;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch (e) {
        throw new StorageIOError("Failed to parse store", this.filePath, e);
      }

      try {
        this.data = decodeStore(raw);
      } catch (e) {
        if (e instanceof ZodError) {
          throw new StorageIOError(`Invalid store document: ${formatStoreIssues(e)}`, this.filePath);
        }
        throw new StorageIOError("Failed to decode store", this.filePath, e);
      }

      log.debug(
        `Loaded ${Object.keys(this.data.cards).length} cards, ${this.data.reviews.length} reviews, ` +
          `${this.data.dueDates.length} due dates from ${this.filePath}`,
      );
    });
  }

  private async writeAtomic(): Promise<void> {
    const tmpPath = this.filePath + TEMP_FILE_SUFFIX;

    let text: string;
    try {
      text = JSON.stringify(encodeStore(this.data), null, 2);
    } catch (e) {
      throw new StorageIOError("Failed to encode store", this.filePath, e);
    }

    try {
      await mkdir(dirname(resolve(this.filePath)), { recursive: true });
      await writeFile(tmpPath, text, "utf8");
      await rename(tmpPath, this.filePath);
    } catch (e) {
      try {
        await rm(tmpPath, { force: true });
      } catch (cleanupErr) {
        log.swallow("remove temp store file", cleanupErr);
      }
      throw new StorageIOError("Failed to save store", this.filePath, e);
    }

    log.debug(`Saved store to ${this.filePath}`);
  }

  private touch() {
    this.data.lastUpdated = this.now();
  }

  private requireCard(id: string): CardRecord {
    const card = this.data.cards[id];
    if (!card) throw new NotFoundError("card", id);
    return card;
  }

  private dueDateIndex(id: string): number {
    const idx = this.data.dueDates.findIndex((d) => d.id === id);
    if (idx < 0) throw new NotFoundError("due date", id);
    return idx;
  }

  private createTransaction(): StoreTransaction {
    return {
      createCard: (front, back, tags) => {
        const now = this.now();
        const id = generateUniqueId((candidate) => candidate in this.data.cards);
        const card: CardRecord = {
          id,
          front,
          back,
          createdAt: now,
          tags: uniqueTags(tags),
          fsrs: {
            due: now,
            stability: 0,
            difficulty: 0,
            elapsedDays: 0,
            scheduledDays: 0,
            learningSteps: 0,
            reps: 0,
            lapses: 0,
            state: State.New,
          },
        };
        this.data.cards[id] = card;
        this.touch();
        log.debug(`Created card ${id}`);
        return clonePlain(card);
      },

      getCard: (id) => clonePlain(this.requireCard(id)),

      updateCard: (card) => {
        const existing = this.requireCard(card.id);
        this.data.cards[card.id] = {
          ...clonePlain(card),
          id: existing.id,
          createdAt: existing.createdAt,
          tags: uniqueTags(card.tags),
        };
        this.touch();
      },

      deleteCard: (id) => {
        this.requireCard(id);
        delete this.data.cards[id];
        this.touch();
        log.debug(`Deleted card ${id}`);
      },

      listCards: (tags) => {
        const all = Object.values(this.data.cards);
        const wanted = tags && tags.length ? new Set(tags) : null;
        const matched = wanted ? all.filter((c) => c.tags.some((t) => wanted.has(t))) : all;
        return matched.sort(byCreatedThenId).map((c) => clonePlain(c));
      },

      addReview: (review) => {
        this.requireCard(review.cardId);
        const taken = new Set(this.data.reviews.map((r) => r.id));
        const entry: ReviewLogEntry = {
          ...clonePlain(review),
          id: review.id || generateUniqueId((candidate) => taken.has(candidate)),
        };
        this.data.reviews.push(entry);
        this.touch();
        return clonePlain(entry);
      },

      getCardReviews: (cardId) => {
        this.requireCard(cardId);
        return this.data.reviews.filter((r) => r.cardId === cardId).map((r) => clonePlain(r));
      },

      addDueDate: (dueDate) => {
        if (dueDate.id && this.data.dueDates.some((d) => d.id === dueDate.id)) {
          throw new ValidationError(`due date already exists: ${dueDate.id}`);
        }
        const entry: DueDate = {
          ...clonePlain(dueDate),
          id: dueDate.id || generateUniqueId((candidate) => this.data.dueDates.some((d) => d.id === candidate)),
        };
        this.data.dueDates.push(entry);
        this.touch();
        return clonePlain(entry);
      },

      listDueDates: () => this.data.dueDates.map((d) => clonePlain(d)),

      getDueDate: (id) => clonePlain(this.data.dueDates[this.dueDateIndex(id)]),

      updateDueDate: (dueDate) => {
        const idx = this.dueDateIndex(dueDate.id);
        this.data.dueDates[idx] = clonePlain(dueDate);
        this.touch();
      },

      deleteDueDate: (id) => {
        const idx = this.dueDateIndex(id);
        this.data.dueDates.splice(idx, 1);
        this.touch();
      },

      snapshot: () => ({
        cards: Object.values(this.data.cards).map((c) => clonePlain(c)),
        reviews: this.data.reviews.map((r) => clonePlain(r)),
      }),

      persist: () => this.writeAtomic(),
    };
  }
}
