// tests/store-codec.test.ts
// ---------------------------------------------------------------------------
// Tests for the persisted document codec — decoding files written with the
// snake_case / PascalCase layout, zero-time handling, defaults for missing
// fields, and rejection of malformed documents.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { State } from "ts-fsrs";
import { decodeStore, encodeCard, encodeStore } from "../src/core/store-codec";
import { ZERO_TIME } from "../src/core/constants";
import { makeCard, makeReview } from "./helpers/fixtures";

// ── Helpers ─────────────────────────────────────────────────────────────────

function persistedDocument(overrides: Record<string, unknown> = {}) {
  return {
    cards: {
      "card-1": {
        id: "card-1",
        front: "What is ATP?",
        back: "Energy currency",
        created_at: "2025-03-01T10:00:00+01:00",
        tags: ["bio"],
        last_reviewed_at: ZERO_TIME,
        fsrs: {
          Due: "2025-03-02T09:00:00Z",
          Stability: 2.5,
          Difficulty: 4.75,
          ElapsedDays: 1,
          ScheduledDays: 1,
          Reps: 3,
          Lapses: 1,
          State: 2,
          LastReview: ZERO_TIME,
        },
      },
    },
    reviews: [
      {
        id: "rev-1",
        card_id: "card-1",
        rating: 3,
        timestamp: "2025-03-01T09:30:00Z",
        scheduled_days: 1,
        elapsed_days: 0,
        state: 2,
      },
    ],
    due_dates: [{ id: "dd-1", topic: "Biology", due_date: "2025-04-01T00:00:00Z", tag: "bio" }],
    last_updated: "2025-03-01T09:30:00Z",
    ...overrides,
  };
}

// ── Decoding ────────────────────────────────────────────────────────────────

describe("decodeStore", () => {
  it("maps persisted fields onto the in-memory records", () => {
    const data = decodeStore(persistedDocument());

    expect(data.cards["card-1"]).toEqual({
      id: "card-1",
      front: "What is ATP?",
      back: "Energy currency",
      createdAt: Date.UTC(2025, 2, 1, 9, 0, 0),
      tags: ["bio"],
      lastReviewedAt: undefined,
      fsrs: {
        due: Date.UTC(2025, 2, 2, 9, 0, 0),
        stability: 2.5,
        difficulty: 4.75,
        elapsedDays: 1,
        scheduledDays: 1,
        learningSteps: 0,
        reps: 3,
        lapses: 1,
        state: State.Review,
        lastReview: undefined,
      },
    });
    expect(data.reviews).toEqual([
      {
        id: "rev-1",
        cardId: "card-1",
        rating: 3,
        timestamp: Date.UTC(2025, 2, 1, 9, 30, 0),
        answer: "",
        scheduledDays: 1,
        elapsedDays: 0,
        state: State.Review,
      },
    ]);
    expect(data.dueDates).toEqual([{ id: "dd-1", topic: "Biology", dueDate: Date.UTC(2025, 3, 1), tag: "bio" }]);
    expect(data.lastUpdated).toBe(Date.UTC(2025, 2, 1, 9, 30, 0));
  });

  it("treats null collections and missing tags as empty", () => {
    const doc = persistedDocument({ reviews: null, due_dates: null });
    const card = doc.cards["card-1"];
    const { tags: _tags, ...untagged } = card;

    const data = decodeStore({ ...doc, cards: { "card-1": untagged } });

    expect(data.cards["card-1"]?.tags).toEqual([]);
    expect(data.reviews).toEqual([]);
    expect(data.dueDates).toEqual([]);
  });

  it("decodes an empty object as an empty store", () => {
    expect(decodeStore({})).toEqual({ cards: {}, reviews: [], dueDates: [], lastUpdated: 0 });
  });

  it("rejects ratings outside 1..4", () => {
    const doc = persistedDocument();
    const bad = { ...doc, reviews: [{ ...doc.reviews[0], rating: 5 }] };
    expect(() => decodeStore(bad)).toThrow(ZodError);
  });

  it("rejects unparseable timestamps", () => {
    const doc = persistedDocument();
    const bad = { ...doc, due_dates: [{ ...doc.due_dates[0], due_date: "next tuesday" }] };
    expect(() => decodeStore(bad)).toThrow(/invalid timestamp/);
  });

  it("rejects an unknown scheduling state", () => {
    const doc = persistedDocument();
    const card = doc.cards["card-1"];
    const bad = { ...doc, cards: { "card-1": { ...card, fsrs: { ...card.fsrs, State: 7 } } } };
    expect(() => decodeStore(bad)).toThrow(ZodError);
  });
});

// ── Encoding ────────────────────────────────────────────────────────────────

describe("encodeStore", () => {
  it("writes absent times as the zero time", () => {
    const encoded = encodeCard(makeCard("c1"));
    expect(encoded.last_reviewed_at).toBe(ZERO_TIME);
    expect(encoded.fsrs.LastReview).toBe(ZERO_TIME);
  });

  it("decodes back to the same data", () => {
    const reviewed = makeCard("c1", {
      tags: ["a", "b"],
      lastReviewedAt: Date.UTC(2025, 0, 2),
      fsrs: { state: State.Relearning, lapses: 2, lastReview: Date.UTC(2025, 0, 2), stability: 0.75 },
    });
    const data = {
      cards: { c1: reviewed, c2: makeCard("c2") },
      reviews: [makeReview("r1", "c1", { answer: "guess" })],
      dueDates: [{ id: "d1", topic: "T", dueDate: Date.UTC(2025, 5, 1), tag: "a" }],
      lastUpdated: Date.UTC(2025, 0, 3),
    };

    expect(decodeStore(JSON.parse(JSON.stringify(encodeStore(data))))).toEqual(data);
  });
});
