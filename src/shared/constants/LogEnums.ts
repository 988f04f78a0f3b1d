/**
 * Log level enumerations for the objective orchestrator.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels, ordered from most to least verbose.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Enumeration of log categories for identifying which subsystem generated the log.
 */
export enum LogCategory {
  /** Objective lifecycle, scheduling and retention */
  OBJECTIVES = "objectives",
  /** Sanity loss, gain and madness effects */
  SANITY = "sanity",
  /** Achievement evaluation and unlocks */
  ACHIEVEMENTS = "achievements",
  /** Behavior analysis, suggestions and difficulty tuning */
  AI = "ai",
  /** Save and load of manager state */
  STORAGE = "storage",
  /** HTTP adapter */
  HTTP = "http",
  /** General/uncategorized logs */
  GENERAL = "general",
}
