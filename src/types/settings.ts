/**
 * @file src/types/settings.ts
 * @summary Settings type definition. Describes the full shape of user-configurable options
 * grouped by area (storage, scheduling, logging, server). Only the type is defined here;
 * the DEFAULT_SETTINGS constant lives in src/core/default-settings.ts.
 *
 * @exports
 *   - FlashcardSettings — type describing the complete settings structure
 */

import type { LogLevel } from "../core/logger";
import type { SchedulerSettings } from "./scheduler";

/**
 * Full settings structure for the flashcard server.
 * Each top-level key groups settings by area.
 */
export type FlashcardSettings = {
  storage: {
    /** Path of the JSON document holding cards, reviews and due dates. */
    filePath: string;
  };

  scheduling: SchedulerSettings;

  logging: {
    level: LogLevel;
  };

  // Identity advertised to protocol clients
  server: {
    name: string;
    version: string;
  };
};
