/**
 * @file src/types/stats.ts
 * @summary Aggregate statistics types returned alongside due cards, card listings and the
 * convenience views (tag counts, due-date progress, learning analysis).
 *
 * @exports
 *   - CardStats — totals, due count, today's reviews and retention
 *   - DueDateProgressStats — mastery counts for one cohort tag
 *   - DueDateProgressInfo — progress of one upcoming due date
 *   - TagInfo — card and due counts for one tag
 *   - LearningAnalysis — low-scoring cards and their common tags
 */

import type { CardRecord } from "./card";
import type { ReviewLogEntry } from "./review";

export type CardStats = {
  totalCards: number;
  dueCards: number;
  reviewsToday: number;
  /** Percentage (0–100) of today's reviews rated Good or Easy. */
  retentionRate: number;
};

export type DueDateProgressStats = {
  totalCards: number;
  masteredCards: number;
  progressPercent: number;
};

export type DueDateProgressInfo = DueDateProgressStats & {
  id: string;
  topic: string;
  /** YYYY-MM-DD */
  dueDate: string;
  tag: string;
  /** Whole days left before the day of the deadline. */
  daysRemaining: number;
  cardsLeft: number;
  /** Cards per day needed to master the rest in time. */
  requiredPace: number;
};

export type TagInfo = {
  tag: string;
  cardCount: number;
  dueCount: number;
  totalCards: number;
  dueCards: number;
};

export type LowScoringCard = {
  card: CardRecord;
  reviews: Pick<ReviewLogEntry, "rating" | "timestamp" | "answer">[];
  avgRating: number;
  reviewCount: number;
};

export type LearningAnalysis = {
  lowScoringCards: LowScoringCard[];
  commonTags: string[];
  totalReviews: number;
  stats: CardStats;
};
