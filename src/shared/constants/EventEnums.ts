/**
 * Event type enumerations for the objective event bus.
 *
 * @module shared/constants/EventEnums
 */

export enum ObjectiveEventType {
  OBJECTIVE_CREATED = "objective_created",
  OBJECTIVE_REMOVED = "objective_removed",
  OBJECTIVE_ACTIVATED = "objective_activated",
  OBJECTIVE_COMPLETED = "objective_completed",
  /** Also emitted for expired and abandoned objectives, with their status */
  OBJECTIVE_FAILED = "objective_failed",
  OBJECTIVE_SUSPENDED = "objective_suspended",
  OBJECTIVE_RESUMED = "objective_resumed",
  OBJECTIVE_STARTED = "objective_started",
  OBJECTIVES_EVICTED = "objectives_evicted",
  ACHIEVEMENT_UNLOCKED = "achievement_unlocked",
}
