/**
 * Achievement enumerations.
 *
 * @module shared/constants/AchievementEnums
 */

export enum AchievementCategory {
  EXPLORATION = "exploration",
  INVESTIGATION = "investigation",
  COMBAT = "combat",
  SOCIAL = "social",
  SURVIVAL = "survival",
  KNOWLEDGE = "knowledge",
  SANITY = "sanity",
  STORY = "story",
  COLLECTION = "collection",
  MASTERY = "mastery",
}

/**
 * Achievement rarity (1-6), used to weight completion scores.
 */
export enum AchievementRarity {
  COMMON = 1,
  UNCOMMON = 2,
  RARE = 3,
  EPIC = 4,
  LEGENDARY = 5,
  MYTHOS = 6,
}

/**
 * What a criterion reads from the snapshots it is evaluated against.
 */
export enum AchievementTrigger {
  /** A player statistic compared to a target */
  STAT_THRESHOLD = "stat_threshold",
  /** Completed objectives counted */
  OBJECTIVE_COMPLETION = "objective_completion",
  /** A recorded event occurred */
  EVENT_OCCURRENCE = "event_occurrence",
  /** A named composite condition over the player stats */
  CONDITION_MET = "condition_met",
  /** A named sequence was completed */
  SEQUENCE_COMPLETION = "sequence_completion",
}

export enum ComparisonOperator {
  EQ = "eq",
  GT = "gt",
  GTE = "gte",
  LT = "lt",
  LTE = "lte",
  IN = "in",
  CONTAINS = "contains",
  /** Number of completed objectives at least the target */
  COUNT = "count",
  /** Number of completed objectives of a type at least the target */
  TYPE_COUNT = "type_count",
  /** At least one matching event recorded */
  OCCURRED = "occurred",
}

/**
 * Composite conditions a CONDITION_MET criterion can name.
 */
export enum AchievementCondition {
  SANITY_STATE = "sanity_state",
  /** Cumulative cosmic exposure at least the target */
  COSMIC_EXPOSURE = "cosmic_exposure",
}
