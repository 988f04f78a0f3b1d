/**
 * Objective enumerations for the objective orchestrator.
 *
 * Defines lifecycle statuses, priorities, types, time scopes and the
 * reward/consequence vocabulary shared by every objective variant.
 *
 * @module shared/constants/ObjectiveEnums
 */

/**
 * Enumeration of objective lifecycle statuses.
 */
export enum ObjectiveStatus {
  /** Not yet activated */
  INACTIVE = "inactive",
  /** Available to pursue */
  ACTIVE = "active",
  /** Explicitly started by the player */
  IN_PROGRESS = "in_progress",
  COMPLETED = "completed",
  FAILED = "failed",
  /** Time limit exceeded */
  EXPIRED = "expired",
  /** Temporarily disabled */
  SUSPENDED = "suspended",
  /** Player chose to abandon */
  ABANDONED = "abandoned",
}

/**
 * Statuses an objective never leaves.
 */
export const TERMINAL_STATUSES: ReadonlySet<ObjectiveStatus> = new Set([
  ObjectiveStatus.COMPLETED,
  ObjectiveStatus.FAILED,
  ObjectiveStatus.EXPIRED,
  ObjectiveStatus.ABANDONED,
]);

/**
 * Enumeration of objective priorities (1-6).
 */
export enum ObjectivePriority {
  /** Optional flavor objectives */
  TRIVIAL = 1,
  /** Side objectives */
  LOW = 2,
  NORMAL = 3,
  /** Important story objectives */
  HIGH = 4,
  /** Essential survival objectives */
  CRITICAL = 5,
  /** Reality-threatening situations */
  COSMIC = 6,
}

export const MIN_PRIORITY = ObjectivePriority.TRIVIAL;
export const MAX_PRIORITY = ObjectivePriority.COSMIC;

/**
 * Enumeration of objective types.
 */
export enum ObjectiveType {
  EXPLORATION = "exploration",
  INVESTIGATION = "investigation",
  SOCIAL = "social",
  SURVIVAL = "survival",
  KNOWLEDGE = "knowledge",
  RITUAL = "ritual",
  ESCAPE = "escape",
  CONFRONTATION = "confrontation",
  PROTECTION = "protection",
  REVELATION = "revelation",
}

/**
 * Enumeration of time horizons an objective is meant to span.
 */
export enum ObjectiveScope {
  /** One or two actions */
  IMMEDIATE = "immediate",
  /** A single scene */
  SHORT_TERM = "short_term",
  /** A session or scenario */
  MID_TERM = "mid_term",
  /** A campaign arc */
  LONG_TERM = "long_term",
  /** Cross-campaign progression */
  META = "meta",
}

/**
 * Registry keys of the built-in objective variants.
 */
export enum ObjectiveKind {
  IMMEDIATE = "immediate",
  SHORT_TERM = "short_term",
  MID_TERM = "mid_term",
  LONG_TERM = "long_term",
  META = "meta",
  SANITY_DEPENDENT = "sanity_dependent",
  COSMIC_INSIGHT = "cosmic_insight",
  MADNESS = "madness",
}

export enum RewardType {
  /** No reward */
  NONE = "none",
  KNOWLEDGE = "knowledge",
  SKILL_IMPROVEMENT = "skill",
  ITEM = "item",
  ALLIANCE = "alliance",
  SAFETY = "safety",
  SANITY_RESTORATION = "sanity",
  REVELATION = "revelation",
  SURVIVAL = "survival",
  COSMIC_INSIGHT = "cosmic_insight",
}

export enum ConsequenceType {
  NONE = "none",
  SAN_LOSS = "san_loss",
  HP_LOSS = "hp_loss",
  RESOURCE_LOSS = "resource_loss",
  TIME_PRESSURE = "time_pressure",
  NEW_THREAT = "new_threat",
  REVELATION_LOST = "revelation_lost",
  NPC_DEATH = "npc_death",
  ESCALATION = "escalation",
  COSMIC_ATTENTION = "cosmic_attention",
}

/**
 * Named checks an objective condition can refer to by name, so they survive
 * serialization.
 */
export enum ConditionCheck {
  HAS_ITEM = "has_item",
  MIN_SANITY = "min_sanity",
  LOCATION = "location",
}
