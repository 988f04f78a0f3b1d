import path from "path";
import { tmpdir } from "os";

import { AIObjectiveMode } from "../shared/constants/AIEnums";

/**
 * Application configuration loaded from environment variables.
 *
 * Numeric and boolean values that fail to parse fall back to their defaults.
 *
 * @module config
 */

type Env = Record<string, string | undefined>;

function intFrom(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function floatFrom(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function boolFrom(value: string | undefined, fallback: boolean): boolean {
  if (value === "true") return true;
  if (value === "false") return false;
  return fallback;
}

function modeFrom(value: string | undefined): AIObjectiveMode {
  return (
    Object.values(AIObjectiveMode).find((mode) => mode === value) ??
    AIObjectiveMode.SUGGESTIONS_ONLY
  );
}

/**
 * Builds the configuration from an environment map.
 *
 * @property {number} PORT - HTTP server port (default: 8080)
 * @property {Object} OBJECTIVES - Admission caps, retention and save path
 * @property {Object} ACHIEVEMENTS - Achievement save path
 * @property {Object} AI - Suggestion coordinator settings
 * @property {Object} DIFFICULTY - Dynamic difficulty tuning
 * @property {string} RANDOM_SEED - Optional PRNG seed
 */
export function loadConfig(env: Env = process.env) {
  const dataDir = env.DATA_DIR || path.join(tmpdir(), "cosmic-objectives");

  return {
    PORT: intFrom(env.PORT, 8080),
    NODE_ENV: env.NODE_ENV || "development",
    DATA_DIR: dataDir,
    OBJECTIVES: {
      MAX_ACTIVE: intFrom(env.OBJECTIVES_MAX_ACTIVE, 20),
      MAX_IMMEDIATE: intFrom(env.OBJECTIVES_MAX_IMMEDIATE, 5),
      MAX_SHORT_TERM: intFrom(env.OBJECTIVES_MAX_SHORT_TERM, 10),
      AUTO_CLEANUP_COMPLETED: boolFrom(env.OBJECTIVES_AUTO_CLEANUP, true),
      AUTO_CLEANUP_AFTER_HOURS: floatFrom(env.OBJECTIVES_CLEANUP_AFTER_HOURS, 24),
      SAVE_PATH: env.OBJECTIVES_SAVE_PATH || path.join(dataDir, "objectives.json"),
    },
    ACHIEVEMENTS: {
      SAVE_PATH: env.ACHIEVEMENTS_SAVE_PATH || path.join(dataDir, "achievements.json"),
    },
    AI: {
      ENABLED: boolFrom(env.AI_ENABLED, true),
      MODE: modeFrom(env.AI_MODE),
      TIMEOUT_MS: intFrom(env.AI_TIMEOUT_MS, 5000),
      CONFIDENCE_THRESHOLD: floatFrom(env.AI_CONFIDENCE_THRESHOLD, 0.6),
      MAX_SUGGESTIONS: intFrom(env.AI_MAX_SUGGESTIONS, 3),
      /** Completion endpoint; AI-refined analysis is off without one */
      ENDPOINT: env.AI_ENDPOINT || undefined,
      API_KEY: env.AI_API_KEY || undefined,
      MODEL: env.AI_MODEL || undefined,
    },
    DIFFICULTY: {
      TARGET_SUCCESS_RATE: floatFrom(env.DIFFICULTY_TARGET_SUCCESS_RATE, 0.7),
      SENSITIVITY: floatFrom(env.DIFFICULTY_SENSITIVITY, 0.1),
      WINDOW: intFrom(env.DIFFICULTY_WINDOW, 10),
    },
    RANDOM_SEED: env.RANDOM_SEED || undefined,
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const CONFIG: AppConfig = loadConfig();
