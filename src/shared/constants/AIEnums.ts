/**
 * AI suggestion and difficulty enumerations.
 *
 * @module shared/constants/AIEnums
 */

/**
 * Primary play styles detected from session history.
 */
export enum PlayerBehaviorPattern {
  CAUTIOUS = "cautious",
  AGGRESSIVE = "aggressive",
  INVESTIGATIVE = "investigative",
  SOCIAL = "social",
  EXPLORER = "explorer",
  SURVIVAL = "survival",
  COMPLETIONIST = "completionist",
  STORY_FOCUSED = "story_focused",
}

export enum DifficultyLevel {
  VERY_EASY = 1,
  EASY = 2,
  NORMAL = 3,
  HARD = 4,
  VERY_HARD = 5,
  NIGHTMARE = 6,
}

/**
 * How much control the AI coordinator takes over objectives.
 */
export enum AIObjectiveMode {
  DISABLED = "disabled",
  SUGGESTIONS_ONLY = "suggestions_only",
  ADAPTIVE = "adaptive",
  FULL_CONTROL = "full_control",
}

/**
 * Candidate sources merged into one suggestion list.
 */
export enum SuggestionSource {
  STORY_PACING = "story_pacing",
  PLAYER_PREFERENCE = "player_preference",
  MISSING_TYPE = "missing_type",
}
