/**
 * @file src/reviewer/review-processor.ts
 * @summary Applies one rating to one card. The whole sequence (read card, correct elapsed
 * days from the review log, ask the oracle for the next state, write the card, append the
 * review, save) runs inside a single exclusive store transaction, so two reviews of the
 * same card can never interleave. A failed step aborts the rest; earlier in-memory writes
 * are kept and the error propagates.
 *
 * @exports
 *   - isReviewRating — type guard for the four rating values
 *   - ReviewRequest — card id, rating and optional free-text answer
 *   - ReviewOutcome — updated card and the appended review
 *   - processReview — run the review sequence against a store
 */

import type { CardRecord } from "../types/card";
import type { ReviewLogEntry } from "../types/review";
import type { ReviewRating, SchedulingOracle } from "../types/scheduler";
import { MS_DAY } from "../core/constants";
import { ValidationError } from "../core/errors";
import { log } from "../core/logger";
import type { JsonStore } from "../core/store";

export function isReviewRating(v: unknown): v is ReviewRating {
  return v === 1 || v === 2 || v === 3 || v === 4;
}

export type ReviewRequest = {
  cardId: string;
  rating: number;
  answer?: string;
};

export type ReviewOutcome = {
  card: CardRecord;
  review: ReviewLogEntry;
};

export function processReview(
  store: JsonStore,
  oracle: SchedulingOracle,
  request: ReviewRequest,
  now: number,
): Promise<ReviewOutcome> {
  const { rating } = request;
  if (!isReviewRating(rating)) {
    return Promise.reject(new ValidationError(`rating must be 1, 2, 3 or 4 (got ${rating})`));
  }

  return store.exclusive(async (tx) => {
    const card = tx.getCard(request.cardId);
    const prior = tx.getCardReviews(card.id);

    if (prior.length > 0) {
      const latest = prior.reduce((max, r) => Math.max(max, r.timestamp), -Infinity);
      card.fsrs.elapsedDays = Math.max(0, Math.floor((now - latest) / MS_DAY));
    }

    const next = oracle.advance(card.fsrs, rating, now);
    const updated: CardRecord = { ...card, fsrs: next, lastReviewedAt: now };
    tx.updateCard(updated);

    const review = tx.addReview({
      cardId: card.id,
      rating,
      timestamp: now,
      answer: request.answer ?? "",
      scheduledDays: next.scheduledDays,
      elapsedDays: next.elapsedDays,
      state: next.state,
    });

    await tx.persist();

    log.debug(`Reviewed card ${card.id}: rating ${rating}, next due ${new Date(next.due).toISOString()}`);
    return { card: tx.getCard(card.id), review };
  });
}
