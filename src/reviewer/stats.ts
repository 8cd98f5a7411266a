/**
 * @file src/reviewer/stats.ts
 * @summary Pure aggregate computations over a store snapshot: headline card stats, per-tag
 * counts, due-date progress (mastery of a cohort tag and the pace needed to finish in time)
 * and the learning analysis that surfaces low-scoring cards. Nothing here reads the clock;
 * `now` is always passed in.
 *
 * @exports
 *   - computeStats — total/due cards, today's reviews and retention
 *   - computeDueDateProgress — mastery stats for the cards carrying one tag
 *   - computeDueDateProgressView — progress of every upcoming due date, soonest first
 *   - computeTagCounts — card and due counts per tag, alphabetical
 *   - analyzeLearning — low-scoring cards and the tags they share
 */

import type { CardRecord } from "../types/card";
import type { ReviewLogEntry } from "../types/review";
import type {
  CardStats,
  DueDateProgressInfo,
  DueDateProgressStats,
  LearningAnalysis,
  LowScoringCard,
  TagInfo,
} from "../types/stats";
import type { DueDate } from "../types/store";
import { CORRECT_RATING_MIN, MASTERED_RATING, MS_DAY } from "../core/constants";
import { formatIsoDate, localDayOfUtcDate, startOfLocalDayMs } from "../core/utils";
import { isDue } from "../scheduler/scheduler";

const LOW_SCORE_THRESHOLD = 2.5;
const LOW_SCORE_LIMIT = 10;
const PRACTICE_TAG_PREFIX = "test-";

function reviewsByCard(reviews: readonly ReviewLogEntry[]): Map<string, ReviewLogEntry[]> {
  const out = new Map<string, ReviewLogEntry[]>();
  for (const r of reviews) {
    const list = out.get(r.cardId);
    if (list) list.push(r);
    else out.set(r.cardId, [r]);
  }
  return out;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Only reviews of cards that still exist are counted. "Today" starts at
 * local midnight.
 */
export function computeStats(
  cards: readonly CardRecord[],
  reviews: readonly ReviewLogEntry[],
  now: number,
): CardStats {
  const live = new Set(cards.map((c) => c.id));
  const dayStart = startOfLocalDayMs(now);

  let reviewsToday = 0;
  let correct = 0;
  for (const r of reviews) {
    if (!live.has(r.cardId) || r.timestamp < dayStart) continue;
    reviewsToday++;
    if (r.rating >= CORRECT_RATING_MIN) correct++;
  }

  return {
    totalCards: cards.length,
    dueCards: cards.filter((c) => isDue(c.fsrs, now)).length,
    reviewsToday,
    retentionRate: reviewsToday > 0 ? (correct / reviewsToday) * 100 : 0,
  };
}

/** A card is mastered when its most recent review was rated Easy. */
export function computeDueDateProgress(
  tag: string,
  cards: readonly CardRecord[],
  reviews: readonly ReviewLogEntry[],
): DueDateProgressStats {
  const cohort = cards.filter((c) => c.tags.includes(tag));
  const byCard = reviewsByCard(reviews);

  let masteredCards = 0;
  for (const card of cohort) {
    let latest: ReviewLogEntry | undefined;
    for (const r of byCard.get(card.id) ?? []) {
      if (!latest || r.timestamp >= latest.timestamp) latest = r;
    }
    if (latest?.rating === MASTERED_RATING) masteredCards++;
  }

  const totalCards = cohort.length;
  return {
    totalCards,
    masteredCards,
    progressPercent: totalCards > 0 ? (masteredCards / totalCards) * 100 : 0,
  };
}

/**
 * Past due dates are dropped, except practice cohorts whose tag starts with
 * "test-". `daysRemaining` excludes the day of the deadline itself.
 */
export function computeDueDateProgressView(
  dueDates: readonly DueDate[],
  cards: readonly CardRecord[],
  reviews: readonly ReviewLogEntry[],
  now: number,
): DueDateProgressInfo[] {
  const today = startOfLocalDayMs(now);
  const out: (DueDateProgressInfo & { sortKey: number })[] = [];

  for (const dd of dueDates) {
    const dueDay = localDayOfUtcDate(dd.dueDate);
    if (dueDay < today && !dd.tag.startsWith(PRACTICE_TAG_PREFIX)) continue;

    const stats = computeDueDateProgress(dd.tag, cards, reviews);
    // Rounded so a DST shift inside the range does not lose a day.
    const days = Math.round((dueDay - today) / MS_DAY);
    const daysRemaining = days < 0 ? 0 : Math.max(0, days - 1);
    const cardsLeft = stats.totalCards - stats.masteredCards;

    out.push({
      id: dd.id,
      topic: dd.topic,
      dueDate: formatIsoDate(dd.dueDate),
      tag: dd.tag,
      ...stats,
      daysRemaining,
      cardsLeft,
      requiredPace: daysRemaining > 0 && cardsLeft > 0 ? cardsLeft / daysRemaining : 0,
      sortKey: dd.dueDate,
    });
  }

  return out.sort((a, b) => a.sortKey - b.sortKey).map(({ sortKey: _sortKey, ...info }) => info);
}

export function computeTagCounts(cards: readonly CardRecord[], now: number): TagInfo[] {
  const counts = new Map<string, { cardCount: number; dueCount: number }>();
  let dueCards = 0;

  for (const card of cards) {
    const due = isDue(card.fsrs, now);
    if (due) dueCards++;
    for (const tag of card.tags) {
      const entry = counts.get(tag) ?? { cardCount: 0, dueCount: 0 };
      entry.cardCount++;
      if (due) entry.dueCount++;
      counts.set(tag, entry);
    }
  }

  return Array.from(counts, ([tag, c]) => ({
    tag,
    cardCount: c.cardCount,
    dueCount: c.dueCount,
    totalCards: cards.length,
    dueCards,
  })).sort((a, b) => compareStrings(a.tag, b.tag));
}

/**
 * Cards averaging 2.5 or lower, worst first (at most 10), plus the tags that
 * more than one of them carries, most frequent first.
 */
export function analyzeLearning(
  cards: readonly CardRecord[],
  reviews: readonly ReviewLogEntry[],
  now: number,
): LearningAnalysis {
  const byCard = reviewsByCard(reviews);
  const analysed: LowScoringCard[] = [];
  let totalReviews = 0;

  for (const card of cards) {
    const cardReviews = byCard.get(card.id) ?? [];
    if (cardReviews.length === 0) continue;
    totalReviews += cardReviews.length;

    const sum = cardReviews.reduce((acc, r) => acc + r.rating, 0);
    analysed.push({
      card,
      reviews: cardReviews.map((r) => ({ rating: r.rating, timestamp: r.timestamp, answer: r.answer })),
      avgRating: sum / cardReviews.length,
      reviewCount: cardReviews.length,
    });
  }

  const lowScoringCards = analysed
    .sort((a, b) => a.avgRating - b.avgRating)
    .filter((a) => a.avgRating <= LOW_SCORE_THRESHOLD)
    .slice(0, LOW_SCORE_LIMIT);

  const tagFrequency = new Map<string, number>();
  for (const low of lowScoringCards) {
    for (const tag of low.card.tags) tagFrequency.set(tag, (tagFrequency.get(tag) ?? 0) + 1);
  }
  const commonTags = Array.from(tagFrequency)
    .filter(([, n]) => n > 1)
    .sort((a, b) => b[1] - a[1] || compareStrings(a[0], b[0]))
    .map(([tag]) => tag);

  return {
    lowScoringCards,
    commonTags,
    totalReviews,
    stats: computeStats(cards, reviews, now),
  };
}
