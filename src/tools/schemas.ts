/**
 * @file src/tools/schemas.ts
 * @summary zod schemas for every tool's arguments, plus the parse helper that turns a zod
 * failure into a ValidationError with one readable message.
 *
 * @exports
 *   - getDueCardArgs / submitReviewArgs / createCardArgs / updateCardArgs / deleteCardArgs
 *   - listCardsArgs / emptyArgs / manageDueDatesArgs
 *   - DUE_DATE_ACTIONS — actions accepted by manage_due_dates
 *   - parseToolArgs — validate raw arguments against a schema
 */

import { z } from "zod";
import { ValidationError } from "../core/errors";

const tags = z.array(z.string());

export const getDueCardArgs = z.object({
  tags: tags.optional(),
});

export const submitReviewArgs = z.object({
  card_id: z.string().min(1, "card_id is required"),
  rating: z.number().int("rating must be a whole number"),
  answer: z.string().optional(),
});

export const createCardArgs = z.object({
  front: z.string(),
  back: z.string(),
  tags: tags.optional(),
  hour_offset: z.number().finite().optional(),
});

export const updateCardArgs = z.object({
  card_id: z.string().min(1, "card_id is required"),
  front: z.string().optional(),
  back: z.string().optional(),
  tags: tags.optional(),
});

export const deleteCardArgs = z.object({
  card_id: z.string().min(1, "card_id is required"),
});

export const listCardsArgs = z.object({
  tags: tags.optional(),
  include_stats: z.boolean().optional(),
});

export const emptyArgs = z.object({});

export const DUE_DATE_ACTIONS = ["create", "list", "update", "delete"] as const;

export const manageDueDatesArgs = z.object({
  action: z.enum(DUE_DATE_ACTIONS),
  topic: z.string().optional(),
  date: z.string().optional(),
  tag: z.string().optional(),
  due_date_id: z.string().optional(),
});

export function parseToolArgs<S extends z.ZodTypeAny>(tool: string, schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw ?? {});
  if (result.success) return result.data;
  const detail = result.error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
  throw new ValidationError(`Invalid arguments for ${tool}: ${detail}`);
}
