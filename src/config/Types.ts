/**
 * Dependency injection type symbols.
 *
 * Used by Inversify container to identify and resolve dependencies.
 * Each symbol represents a unique service or configuration value.
 *
 * @module config
 */
export const TYPES = {
  ObjectiveManagerConfig: Symbol.for("ObjectiveManagerConfig"),
  ObjectiveRegistry: Symbol.for("ObjectiveRegistry"),
  ObjectiveEventBus: Symbol.for("ObjectiveEventBus"),
  ObjectiveManager: Symbol.for("ObjectiveManager"),

  AchievementManager: Symbol.for("AchievementManager"),

  AICoordinatorConfig: Symbol.for("AICoordinatorConfig"),
  DifficultyConfig: Symbol.for("DifficultyConfig"),
  TextGenerationClient: Symbol.for("TextGenerationClient"),
  AIObjectiveGenerator: Symbol.for("AIObjectiveGenerator"),
  DynamicDifficultyAdjuster: Symbol.for("DynamicDifficultyAdjuster"),
  AIObjectiveCoordinator: Symbol.for("AIObjectiveCoordinator"),

  ObjectiveController: Symbol.for("ObjectiveController"),
  AchievementController: Symbol.for("AchievementController"),
};
