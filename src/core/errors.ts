/**
 * @file src/core/errors.ts
 * @summary Typed error taxonomy. Every error raised by the store, scheduler, review
 * processor or service extends FlashcardError and carries a stable `code` the request layer
 * maps to a response. Selection errors carry the aggregate stats computed over all cards.
 *
 * @exports
 *   - ErrorCode — union of stable error codes
 *   - FlashcardError — base class with a `code`
 *   - NotFoundError — unknown card, due-date or resource id
 *   - NoCardsDueError / NoCardsDueWithTagsError / NoCardsMatchingTagsError — empty selections
 *   - ValidationError — rejected input
 *   - StorageIOError — read, write, encode or decode failure of the backing file
 *   - isFlashcardError — type guard that also works across module copies
 *   - errorMessage — message of an unknown thrown value
 */

import type { CardStats } from "../types/stats";

export type ErrorCode =
  | "NOT_FOUND"
  | "NO_CARDS_DUE"
  | "NO_CARDS_DUE_WITH_TAGS"
  | "NO_CARDS_MATCHING_TAGS"
  | "VALIDATION_ERROR"
  | "STORAGE_IO_ERROR";

const ERROR_CODES: readonly ErrorCode[] = [
  "NOT_FOUND",
  "NO_CARDS_DUE",
  "NO_CARDS_DUE_WITH_TAGS",
  "NO_CARDS_MATCHING_TAGS",
  "VALIDATION_ERROR",
  "STORAGE_IO_ERROR",
];

export class FlashcardError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FlashcardError";
    this.code = code;
  }
}

export type NotFoundEntity = "card" | "due date" | "resource";

export class NotFoundError extends FlashcardError {
  readonly entity: NotFoundEntity;
  readonly id: string;

  constructor(entity: NotFoundEntity, id: string) {
    super(`${entity} not found: ${id}`, "NOT_FOUND");
    this.name = "NotFoundError";
    this.entity = entity;
    this.id = id;
  }
}

/**
 * Base for the "nothing to review" outcomes. The stats always describe the
 * whole store, whatever filter was applied.
 */
abstract class SelectionError extends FlashcardError {
  readonly stats: CardStats;
  readonly tags: string[];

  protected constructor(message: string, code: ErrorCode, stats: CardStats, tags: string[]) {
    super(message, code);
    this.stats = stats;
    this.tags = tags;
  }
}

export class NoCardsDueError extends SelectionError {
  constructor(stats: CardStats) {
    super("No cards due for review", "NO_CARDS_DUE", stats, []);
    this.name = "NoCardsDueError";
  }
}

export class NoCardsDueWithTagsError extends SelectionError {
  constructor(stats: CardStats, tags: string[]) {
    super(`No cards due for review with the specified tags: ${tags.join(", ")}`, "NO_CARDS_DUE_WITH_TAGS", stats, tags);
    this.name = "NoCardsDueWithTagsError";
  }
}

export class NoCardsMatchingTagsError extends SelectionError {
  constructor(stats: CardStats, tags: string[]) {
    super(`No cards found with the specified tags: ${tags.join(", ")}`, "NO_CARDS_MATCHING_TAGS", stats, tags);
    this.name = "NoCardsMatchingTagsError";
  }
}

export type SelectionFailure = NoCardsDueError | NoCardsDueWithTagsError | NoCardsMatchingTagsError;

export class ValidationError extends FlashcardError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class StorageIOError extends FlashcardError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${errorMessage(cause)}`, "STORAGE_IO_ERROR", { cause });
    this.name = "StorageIOError";
    this.filePath = filePath;
  }
}

/**
 * Checks the `code` as well as the prototype chain, since instanceof
 * fails when two copies of this module are loaded.
 */
export function isFlashcardError(error: unknown): error is FlashcardError {
  if (error instanceof FlashcardError) return true;
  if (!(error instanceof Error) || !("code" in error)) return false;
  const code: unknown = error.code;
  return typeof code === "string" && (ERROR_CODES as readonly string[]).includes(code);
}

export function isSelectionError(error: unknown): error is SelectionFailure {
  return error instanceof SelectionError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}
