// tests/store.test.ts
// ---------------------------------------------------------------------------
// Tests for JsonStore — card, review and due-date CRUD, OR tag listing,
// copy semantics, and the file lifecycle (bootstrap on load, atomic save,
// temp-file cleanup, corrupt-file failure, save/load round trip).
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { State } from "ts-fsrs";
import { JsonStore } from "../src/core/store";
import { NotFoundError, StorageIOError, ValidationError } from "../src/core/errors";
import { ZERO_TIME } from "../src/core/constants";
import { NOW, makeTempDir } from "./helpers/fixtures";

let dir: string;
let cleanup: () => Promise<void>;
let file: string;

beforeEach(async () => {
  ({ dir, cleanup } = await makeTempDir());
  file = join(dir, "flashcards.json");
});

afterEach(async () => {
  await cleanup();
});

/** Each call returns one millisecond later, so creation order is stable. */
function tickingClock(start = NOW): () => number {
  let t = start;
  return () => t++;
}

// ── Cards ───────────────────────────────────────────────────────────────────

describe("JsonStore cards", () => {
  it("creates a New card due now with zeroed scheduling state", async () => {
    const store = new JsonStore(file, { now: () => NOW });
    const card = await store.createCard("Q", "A", ["bio", "cell"]);

    expect(card.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(card.front).toBe("Q");
    expect(card.back).toBe("A");
    expect(card.tags).toEqual(["bio", "cell"]);
    expect(card.createdAt).toBe(NOW);
    expect(card.lastReviewedAt).toBeUndefined();
    expect(card.fsrs).toEqual({
      due: NOW,
      stability: 0,
      difficulty: 0,
      elapsedDays: 0,
      scheduledDays: 0,
      learningSteps: 0,
      reps: 0,
      lapses: 0,
      state: State.New,
    });
    await expect(store.getCard(card.id)).resolves.toEqual(card);
  });

  it("drops duplicate tags and keeps their order", async () => {
    const store = new JsonStore(file);
    const card = await store.createCard("Q", "A", ["b", "a", "b"]);
    expect(card.tags).toEqual(["b", "a"]);
  });

  it("returns copies, never references into the store", async () => {
    const store = new JsonStore(file);
    const card = await store.createCard("Q", "A", ["x"]);

    card.front = "changed";
    card.tags.push("y");
    card.fsrs.reps = 99;

    const fresh = await store.getCard(card.id);
    expect(fresh.front).toBe("Q");
    expect(fresh.tags).toEqual(["x"]);
    expect(fresh.fsrs.reps).toBe(0);
  });

  it("rejects unknown ids with NotFoundError", async () => {
    const store = new JsonStore(file);
    await expect(store.getCard("missing")).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.deleteCard("missing")).rejects.toBeInstanceOf(NotFoundError);

    const card = await store.createCard("Q", "A");
    await expect(store.updateCard({ ...card, id: "missing" })).rejects.toThrow("card not found: missing");
  });

  it("updates content but keeps the stored createdAt", async () => {
    const store = new JsonStore(file, { now: () => NOW });
    const card = await store.createCard("Q", "A");

    await store.updateCard({ ...card, front: "Q2", createdAt: 1, tags: ["t", "t"] });

    const updated = await store.getCard(card.id);
    expect(updated.front).toBe("Q2");
    expect(updated.createdAt).toBe(NOW);
    expect(updated.tags).toEqual(["t"]);
  });

  it("lists cards matching ANY of the given tags, oldest first", async () => {
    const store = new JsonStore(file, { now: tickingClock() });
    const a = await store.createCard("a", "a", ["x"]);
    const b = await store.createCard("b", "b", ["y"]);
    const c = await store.createCard("c", "c", ["x", "y"]);
    const d = await store.createCard("d", "d", []);

    const ids = async (tags?: string[]) => (await store.listCards(tags)).map((card) => card.id);

    expect(await ids(["x"])).toEqual([a.id, c.id]);
    expect(await ids(["x", "y"])).toEqual([a.id, b.id, c.id]);
    expect(await ids(["z"])).toEqual([]);
    expect(await ids()).toEqual([a.id, b.id, c.id, d.id]);
    expect(await ids([])).toEqual([a.id, b.id, c.id, d.id]);
  });

  it("returns the same listing on repeated reads", async () => {
    const store = new JsonStore(file, { now: tickingClock() });
    await store.createCard("a", "a");
    await store.createCard("b", "b");

    const first = await store.listCards();
    const second = await store.listCards();
    expect(second).toEqual(first);
    expect(second).toHaveLength(2);
  });
});

// ── Reviews ─────────────────────────────────────────────────────────────────

describe("JsonStore reviews", () => {
  it("appends reviews with generated ids and returns them per card", async () => {
    const store = new JsonStore(file);
    const card = await store.createCard("Q", "A");

    const review = await store.addReview({
      cardId: card.id,
      rating: 3,
      timestamp: NOW,
      answer: "mitochondria",
      scheduledDays: 2,
      elapsedDays: 0,
      state: State.Review,
    });

    expect(review.id).not.toBe("");
    await expect(store.getCardReviews(card.id)).resolves.toEqual([review]);
  });

  it("refuses reviews for cards that do not exist", async () => {
    const store = new JsonStore(file);
    await expect(
      store.addReview({
        cardId: "ghost",
        rating: 1,
        timestamp: NOW,
        answer: "",
        scheduledDays: 0,
        elapsedDays: 0,
        state: State.Learning,
      }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("keeps reviews of deleted cards in the log but hides them behind NotFound", async () => {
    const store = new JsonStore(file);
    const card = await store.createCard("Q", "A");
    await store.addReview({
      cardId: card.id,
      rating: 4,
      timestamp: NOW,
      answer: "",
      scheduledDays: 4,
      elapsedDays: 0,
      state: State.Review,
    });

    await store.deleteCard(card.id);

    await expect(store.getCard(card.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.getCardReviews(card.id)).rejects.toBeInstanceOf(NotFoundError);
    const snap = await store.snapshot();
    expect(snap.cards).toEqual([]);
    expect(snap.reviews.map((r) => r.cardId)).toEqual([card.id]);
  });
});

// ── Due dates ───────────────────────────────────────────────────────────────

describe("JsonStore due dates", () => {
  it("supports add, get, list, update and delete", async () => {
    const store = new JsonStore(file);
    const created = await store.addDueDate({ topic: "Biology", dueDate: NOW, tag: "bio" });

    await expect(store.getDueDate(created.id)).resolves.toEqual(created);
    await expect(store.listDueDates()).resolves.toEqual([created]);

    await store.updateDueDate({ ...created, topic: "Biology Final" });
    await expect(store.getDueDate(created.id)).resolves.toEqual({ ...created, topic: "Biology Final" });

    await store.deleteDueDate(created.id);
    await expect(store.listDueDates()).resolves.toEqual([]);
  });

  it("rejects unknown due-date ids with NotFoundError", async () => {
    const store = new JsonStore(file);
    await expect(store.getDueDate("nope")).rejects.toThrow("due date not found: nope");
    await expect(store.deleteDueDate("nope")).rejects.toBeInstanceOf(NotFoundError);
    await expect(
      store.updateDueDate({ id: "nope", topic: "x", dueDate: NOW, tag: "x" }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("refuses a duplicate explicit id", async () => {
    const store = new JsonStore(file);
    await store.addDueDate({ id: "dd-1", topic: "A", dueDate: NOW, tag: "a" });
    await expect(store.addDueDate({ id: "dd-1", topic: "B", dueDate: NOW, tag: "b" })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });
});

// ── Persistence ─────────────────────────────────────────────────────────────

describe("JsonStore persistence", () => {
  it("creates the file with an empty store when loading a missing path", async () => {
    const nested = join(dir, "nested", "deeper", "cards.json");
    const store = new JsonStore(nested);

    await store.load();

    const doc = JSON.parse(await readFile(nested, "utf8"));
    expect(doc.cards).toEqual({});
    expect(doc.reviews).toEqual([]);
    expect(doc.due_dates).toEqual([]);
    await expect(store.listCards()).resolves.toEqual([]);
  });

  it("loads a zero-byte file as an empty store without rewriting it", async () => {
    await writeFile(file, "");
    const store = new JsonStore(file);

    await store.load();

    await expect(store.listCards()).resolves.toEqual([]);
    expect(await readFile(file, "utf8")).toBe("");
  });

  it("fails with StorageIOError on invalid JSON", async () => {
    await writeFile(file, "{ not json");
    const store = new JsonStore(file);
    await expect(store.load()).rejects.toBeInstanceOf(StorageIOError);
  });

  it("fails with StorageIOError when the document has the wrong shape", async () => {
    await writeFile(file, JSON.stringify({ cards: 5 }));
    const store = new JsonStore(file);
    await expect(store.load()).rejects.toThrow(/^Invalid store document: cards:/);
  });

  it("writes the persisted field names", async () => {
    const store = new JsonStore(file, { now: () => NOW });
    const card = await store.createCard("Q", "A", ["t"]);
    await store.addDueDate({ id: "dd-1", topic: "Exam", dueDate: Date.UTC(2026, 2, 1), tag: "t" });
    await store.save();

    const doc = JSON.parse(await readFile(file, "utf8"));
    expect(Object.keys(doc).sort()).toEqual(["cards", "due_dates", "last_updated", "reviews"]);

    const saved = doc.cards[card.id];
    expect(saved.created_at).toBe(new Date(NOW).toISOString());
    expect(saved.last_reviewed_at).toBe(ZERO_TIME);
    expect(saved.fsrs.State).toBe(0);
    expect(saved.fsrs.LastReview).toBe(ZERO_TIME);
    expect(saved.fsrs.Due).toBe(new Date(NOW).toISOString());
    expect(doc.due_dates).toEqual([{ id: "dd-1", topic: "Exam", due_date: "2026-03-01T00:00:00.000Z", tag: "t" }]);
  });

  it("reconstructs an equivalent store after save and load", async () => {
    const store = new JsonStore(file, { now: tickingClock() });
    const a = await store.createCard("a", "1", ["x"]);
    const b = await store.createCard("b", "2", []);
    await store.updateCard({
      ...b,
      lastReviewedAt: NOW + 500,
      fsrs: { ...b.fsrs, state: State.Review, stability: 3.25, difficulty: 5.5, reps: 2, lastReview: NOW + 500 },
    });
    await store.addReview({
      cardId: a.id,
      rating: 2,
      timestamp: NOW + 100,
      answer: "close",
      scheduledDays: 1,
      elapsedDays: 0,
      state: State.Learning,
    });
    await store.addDueDate({ topic: "Exam", dueDate: Date.UTC(2026, 2, 1), tag: "x" });
    await store.save();

    const reloaded = new JsonStore(file);
    await reloaded.load();

    expect(await reloaded.listCards()).toEqual(await store.listCards());
    expect(await reloaded.snapshot()).toEqual(await store.snapshot());
    expect(await reloaded.listDueDates()).toEqual(await store.listDueDates());
  });

  it("removes the temp file and throws StorageIOError when the rename fails", async () => {
    // A non-empty directory at the target path makes the final rename fail.
    await mkdir(file);
    await writeFile(join(file, "occupied"), "x");
    const store = new JsonStore(file);
    await store.createCard("Q", "A");

    await expect(store.save()).rejects.toBeInstanceOf(StorageIOError);
    await expect(access(file + ".tmp")).rejects.toThrow();
  });

  it("reports an unreadable path as StorageIOError", async () => {
    await mkdir(file);
    const store = new JsonStore(file);
    await expect(store.load()).rejects.toBeInstanceOf(StorageIOError);
  });
});
