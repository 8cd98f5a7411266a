// tests/errors.test.ts
// ---------------------------------------------------------------------------
// Tests for the error taxonomy — messages, codes and the type guards.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import {
  FlashcardError,
  NoCardsDueError,
  NoCardsDueWithTagsError,
  NotFoundError,
  StorageIOError,
  ValidationError,
  errorMessage,
  isFlashcardError,
  isSelectionError,
} from "../src/core/errors";

const STATS = { totalCards: 1, dueCards: 0, reviewsToday: 0, retentionRate: 0 };

describe("errors", () => {
  it("formats not-found messages by entity", () => {
    const err = new NotFoundError("due date", "dd-1");
    expect(err.message).toBe("due date not found: dd-1");
    expect(err.code).toBe("NOT_FOUND");
    expect(err).toBeInstanceOf(FlashcardError);
  });

  it("appends the cause to storage errors", () => {
    const cause = new Error("EACCES: permission denied");
    const err = new StorageIOError("Failed to save store", "/tmp/x.json", cause);

    expect(err.message).toBe("Failed to save store: EACCES: permission denied");
    expect(err.cause).toBe(cause);
    expect(err.filePath).toBe("/tmp/x.json");
    expect(new StorageIOError("Bad", "/f").message).toBe("Bad");
  });

  it("lists the requested tags in selection errors", () => {
    const err = new NoCardsDueWithTagsError(STATS, ["bio", "exam"]);
    expect(err.message).toBe("No cards due for review with the specified tags: bio, exam");
    expect(err.code).toBe("NO_CARDS_DUE_WITH_TAGS");
    expect(err.stats).toBe(STATS);
  });

  it("recognises selection errors only", () => {
    expect(isSelectionError(new NoCardsDueError(STATS))).toBe(true);
    expect(isSelectionError(new ValidationError("x"))).toBe(false);
  });

  it("recognises flashcard errors by code as well as by class", () => {
    const foreign = Object.assign(new Error("copy"), { code: "NOT_FOUND" });

    expect(isFlashcardError(new ValidationError("x"))).toBe(true);
    expect(isFlashcardError(foreign)).toBe(true);
    expect(isFlashcardError(Object.assign(new Error("fs"), { code: "ENOENT" }))).toBe(false);
    expect(isFlashcardError("NOT_FOUND")).toBe(false);
  });

  it("extracts a message from anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
