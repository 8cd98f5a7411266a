/**
 * @file src/core/store-codec.ts
 * @summary Conversion between the persisted JSON document and the in-memory StoreData.
 * The document uses snake_case record fields, PascalCase scheduling fields and RFC 3339
 * timestamps; absent times are written as the zero time "0001-01-01T00:00:00Z". Decoding
 * validates the whole document with zod and throws on any shape error.
 *
 * @exports
 *   - storeDocumentSchema — zod schema of the persisted document (decodes to StoreData)
 *   - StoreDocument — JSON shape written to disk
 *   - decodeStore — validate a parsed JSON value into StoreData
 *   - encodeStore — turn StoreData into the JSON document
 *   - encodeCard / encodeReview / encodeDueDate — single records in their persisted shape
 *   - formatStoreIssues — one-line summary of a zod error
 */

import { State } from "ts-fsrs";
import { z } from "zod";
import type { CardRecord } from "../types/card";
import type { ReviewLogEntry } from "../types/review";
import type { SchedulingState } from "../types/scheduler";
import type { DueDate, StoreData } from "../types/store";
import { ZERO_TIME } from "./constants";

// ── Field codecs ────────────────────────────────────────────────────

const ZERO_YEAR_PREFIX = "0001-01-01T00:00:00";

const instant = z.string().transform((v, ctx) => {
  const ms = Date.parse(v);
  if (Number.isNaN(ms)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp "${v}"` });
    return z.NEVER;
  }
  return ms;
});

/** Missing, null and the zero time all decode to "absent". */
const optionalInstant = z
  .string()
  .nullish()
  .transform((v, ctx) => {
    if (v == null || v.startsWith(ZERO_YEAR_PREFIX)) return undefined;
    const ms = Date.parse(v);
    if (Number.isNaN(ms)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp "${v}"` });
      return z.NEVER;
    }
    return ms;
  });

const count = z.number().int().nonnegative();
const rating = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]);

function toTimestamp(ms: number | undefined): string {
  return ms === undefined ? ZERO_TIME : new Date(ms).toISOString();
}

// ── Records ─────────────────────────────────────────────────────────

const fsrsSchema = z.object({
  Due: instant,
  Stability: z.number().finite().default(0),
  Difficulty: z.number().finite().default(0),
  ElapsedDays: count.default(0),
  ScheduledDays: count.default(0),
  LearningSteps: count.default(0),
  Reps: count.default(0),
  Lapses: count.default(0),
  State: z.nativeEnum(State).default(State.New),
  LastReview: optionalInstant,
});

const cardSchema = z.object({
  id: z.string().min(1),
  front: z.string(),
  back: z.string(),
  created_at: instant,
  tags: z.array(z.string()).nullish(),
  last_reviewed_at: optionalInstant,
  fsrs: fsrsSchema,
});

const reviewSchema = z.object({
  id: z.string().min(1),
  card_id: z.string().min(1),
  rating,
  timestamp: instant,
  answer: z.string().nullish(),
  scheduled_days: count.default(0),
  elapsed_days: count.default(0),
  state: z.nativeEnum(State).default(State.New),
});

const dueDateSchema = z.object({
  id: z.string().min(1),
  topic: z.string(),
  due_date: instant,
  tag: z.string(),
});

function toSchedulingState(f: z.output<typeof fsrsSchema>): SchedulingState {
  return {
    due: f.Due,
    stability: f.Stability,
    difficulty: f.Difficulty,
    elapsedDays: f.ElapsedDays,
    scheduledDays: f.ScheduledDays,
    learningSteps: f.LearningSteps,
    reps: f.Reps,
    lapses: f.Lapses,
    state: f.State,
    lastReview: f.LastReview,
  };
}

export const storeDocumentSchema = z
  .object({
    cards: z.record(cardSchema).nullish(),
    reviews: z.array(reviewSchema).nullish(),
    due_dates: z.array(dueDateSchema).nullish(),
    last_updated: optionalInstant,
  })
  .transform((doc): StoreData => {
    const cards: Record<string, CardRecord> = {};
    for (const c of Object.values(doc.cards ?? {})) {
      cards[c.id] = {
        id: c.id,
        front: c.front,
        back: c.back,
        createdAt: c.created_at,
        tags: c.tags ?? [],
        lastReviewedAt: c.last_reviewed_at,
        fsrs: toSchedulingState(c.fsrs),
      };
    }

    const reviews: ReviewLogEntry[] = (doc.reviews ?? []).map((r) => ({
      id: r.id,
      cardId: r.card_id,
      rating: r.rating,
      timestamp: r.timestamp,
      answer: r.answer ?? "",
      scheduledDays: r.scheduled_days,
      elapsedDays: r.elapsed_days,
      state: r.state,
    }));

    const dueDates: DueDate[] = (doc.due_dates ?? []).map((d) => ({
      id: d.id,
      topic: d.topic,
      dueDate: d.due_date,
      tag: d.tag,
    }));

    return { cards, reviews, dueDates, lastUpdated: doc.last_updated ?? 0 };
  });

export type StoreDocument = z.input<typeof storeDocumentSchema>;

// ── Public API ──────────────────────────────────────────────────────

/** Throws ZodError when the value does not match the document shape. */
export function decodeStore(raw: unknown): StoreData {
  return storeDocumentSchema.parse(raw);
}

type EncodedCard = NonNullable<StoreDocument["cards"]>[string];
type EncodedReview = NonNullable<StoreDocument["reviews"]>[number];
type EncodedDueDate = NonNullable<StoreDocument["due_dates"]>[number];

export function encodeCard(card: CardRecord): EncodedCard {
  const f = card.fsrs;
  return {
    id: card.id,
    front: card.front,
    back: card.back,
    created_at: toTimestamp(card.createdAt),
    tags: card.tags,
    last_reviewed_at: toTimestamp(card.lastReviewedAt),
    fsrs: {
      Due: toTimestamp(f.due),
      Stability: f.stability,
      Difficulty: f.difficulty,
      ElapsedDays: f.elapsedDays,
      ScheduledDays: f.scheduledDays,
      LearningSteps: f.learningSteps,
      Reps: f.reps,
      Lapses: f.lapses,
      State: f.state,
      LastReview: toTimestamp(f.lastReview),
    },
  };
}

export function encodeReview(r: ReviewLogEntry): EncodedReview {
  return {
    id: r.id,
    card_id: r.cardId,
    rating: r.rating,
    timestamp: toTimestamp(r.timestamp),
    answer: r.answer,
    scheduled_days: r.scheduledDays,
    elapsed_days: r.elapsedDays,
    state: r.state,
  };
}

export function encodeDueDate(d: DueDate): EncodedDueDate {
  return {
    id: d.id,
    topic: d.topic,
    due_date: toTimestamp(d.dueDate),
    tag: d.tag,
  };
}

export function encodeStore(data: StoreData): StoreDocument {
  const cards: NonNullable<StoreDocument["cards"]> = {};
  for (const card of Object.values(data.cards)) cards[card.id] = encodeCard(card);

  return {
    cards,
    reviews: data.reviews.map(encodeReview),
    due_dates: data.dueDates.map(encodeDueDate),
    last_updated: toTimestamp(data.lastUpdated),
  };
}

export function formatStoreIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
