/**
 * @file src/core/default-settings.ts
 * @summary Provides the factory-default values for every setting. Re-exports the
 * FlashcardSettings type from src/types/settings.ts so downstream code can import both the
 * type and the defaults from one location.
 *
 * @exports
 *   - FlashcardSettings (re-exported type) — full settings shape
 *   - DEFAULT_SETTINGS — constant object with factory-default values for all settings
 */

export type { FlashcardSettings } from "../types/settings";
import type { FlashcardSettings } from "../types/settings";
import { APP_NAME, APP_VERSION } from "./constants";

/** Factory-default values for every setting. */
export const DEFAULT_SETTINGS: FlashcardSettings = {
  storage: {
    filePath: "./flashcards.json",
  },

  scheduling: {
    learningStepsMinutes: [1, 10],
    relearningStepsMinutes: [10],
    requestRetention: 0.9,
    maximumIntervalDays: 36500,
  },

  logging: {
    level: "info",
  },

  server: {
    name: APP_NAME,
    version: APP_VERSION,
  },
};
