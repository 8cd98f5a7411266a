/**
 * @file src/core/config.ts
 * @summary Builds the runtime settings: factory defaults, then environment variables, then
 * command-line flags, deep-merged and normalised in place (missing values filled, numeric
 * ranges clamped).
 *
 * @exports
 *   - ENV_VARS — environment variable names read at startup
 *   - loadConfig — parse argv/env into a complete FlashcardSettings object
 *   - normaliseSettingsInPlace — fill defaults and clamp values on a settings object
 */

import { parseArgs } from "node:util";
import { deepMerge, type DeepPartial } from "./constants";
import { DEFAULT_SETTINGS, type FlashcardSettings } from "./default-settings";
import { ValidationError, errorMessage } from "./errors";
import { isLogLevel, LOG_LEVELS } from "./logger";
import { clamp, cleanPositiveNumberArray, clonePlain } from "./utils";

export const ENV_VARS = {
  file: "FLASHCARDS_FILE",
  logLevel: "FLASHCARDS_LOG_LEVEL",
  retention: "FLASHCARDS_RETENTION",
} as const;

type RawOptions = {
  file?: string;
  logLevel?: string;
  retention?: string;
};

function parseFlags(argv: string[]): RawOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        file: { type: "string" },
        "log-level": { type: "string" },
        retention: { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    });
    return { file: values.file, logLevel: values["log-level"], retention: values.retention };
  } catch (e) {
    throw new ValidationError(`Invalid command-line arguments: ${errorMessage(e)}`);
  }
}

function readEnv(env: NodeJS.ProcessEnv): RawOptions {
  const pick = (key: string) => {
    const v = env[key];
    return v === undefined || v.trim() === "" ? undefined : v.trim();
  };
  return {
    file: pick(ENV_VARS.file),
    logLevel: pick(ENV_VARS.logLevel),
    retention: pick(ENV_VARS.retention),
  };
}

function toOverrides(raw: RawOptions, source: string): DeepPartial<FlashcardSettings> {
  const out: DeepPartial<FlashcardSettings> = {};

  if (raw.file !== undefined) {
    if (!raw.file) throw new ValidationError(`Empty file path (${source})`);
    out.storage = { filePath: raw.file };
  }

  if (raw.logLevel !== undefined) {
    const level = raw.logLevel.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ValidationError(
        `Invalid log level "${raw.logLevel}" (${source}); expected one of ${LOG_LEVELS.join(", ")}`,
      );
    }
    out.logging = { level };
  }

  if (raw.retention !== undefined) {
    const n = Number(raw.retention);
    if (!Number.isFinite(n)) {
      throw new ValidationError(`Invalid retention "${raw.retention}" (${source}); expected a number`);
    }
    out.scheduling = { requestRetention: n };
  }

  return out;
}

/**
 * Normalise a settings object in place: fill missing keys with defaults and
 * clamp numeric ranges.
 */
export function normaliseSettingsInPlace(s: FlashcardSettings): void {
  s.storage.filePath = s.storage.filePath.trim() || DEFAULT_SETTINGS.storage.filePath;

  s.scheduling.learningStepsMinutes = cleanPositiveNumberArray(
    s.scheduling.learningStepsMinutes,
    DEFAULT_SETTINGS.scheduling.learningStepsMinutes,
  );

  s.scheduling.relearningStepsMinutes = cleanPositiveNumberArray(
    s.scheduling.relearningStepsMinutes,
    DEFAULT_SETTINGS.scheduling.relearningStepsMinutes,
  );

  s.scheduling.requestRetention = clamp(
    Number(s.scheduling.requestRetention ?? DEFAULT_SETTINGS.scheduling.requestRetention),
    0.8,
    0.97,
  );

  const maxInterval = Math.floor(Number(s.scheduling.maximumIntervalDays));
  s.scheduling.maximumIntervalDays = Number.isFinite(maxInterval)
    ? Math.max(1, maxInterval)
    : DEFAULT_SETTINGS.scheduling.maximumIntervalDays;

  if (!isLogLevel(s.logging.level)) s.logging.level = DEFAULT_SETTINGS.logging.level;
}

/**
 * Defaults ← environment ← flags. Throws ValidationError for unknown flags,
 * unknown log levels and malformed numbers.
 */
export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): FlashcardSettings {
  let settings = clonePlain(DEFAULT_SETTINGS);
  settings = deepMerge(settings, toOverrides(readEnv(env), "environment"));
  settings = deepMerge(settings, toOverrides(parseFlags(argv), "command line"));
  normaliseSettingsInPlace(settings);
  return settings;
}
