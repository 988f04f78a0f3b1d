import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG } from "./config";

/**
 * Dependency injection container configuration.
 *
 * Every service is a singleton within its container. `createContainer` builds
 * an independent graph, so tests can run isolated managers side by side;
 * `container` is the process-wide graph the HTTP layer uses.
 *
 * Services registered:
 * - Objectives: ObjectiveRegistry, ObjectiveEventBus, ObjectiveManager
 * - Achievements: AchievementManager
 * - AI: AIObjectiveGenerator, DynamicDifficultyAdjuster, AIObjectiveCoordinator
 * - HTTP: ObjectiveController, AchievementController
 *
 * @module config
 */
import { ObjectiveEventType } from "../shared/constants/EventEnums";
import { readNumber, readString } from "../shared/utils/snapshotUtils";
import {
  ObjectiveManager,
  type ObjectiveManagerConfig,
} from "../domain/objectives/ObjectiveManager";
import { ObjectiveRegistry } from "../domain/objectives/ObjectiveRegistry";
import {
  ObjectiveEventBus,
  type ObjectiveBusEvent,
} from "../domain/objectives/core/ObjectiveEventBus";
import { AchievementManager } from "../domain/achievements/AchievementManager";
import { AIObjectiveGenerator } from "../domain/ai/AIObjectiveGenerator";
import { DynamicDifficultyAdjuster } from "../domain/ai/DynamicDifficultyAdjuster";
import { AIObjectiveCoordinator } from "../domain/ai/AIObjectiveCoordinator";
import {
  HttpTextGenerationClient,
  type TextGenerationClient,
} from "../domain/ai/TextGenerationClient";
import type { AICoordinatorConfig, DifficultyConfig } from "../domain/types/ai";
import { ObjectiveController } from "../infrastructure/controllers/objectiveController";
import { AchievementController } from "../infrastructure/controllers/achievementController";

export interface ContainerOverrides {
  objectives?: Partial<ObjectiveManagerConfig>;
  ai?: Partial<AICoordinatorConfig>;
  difficulty?: Partial<DifficultyConfig>;
  /** null leaves the AI-refined analysis unbound */
  textClient?: TextGenerationClient | null;
}

function defaultTextClient(): TextGenerationClient | null {
  if (!CONFIG.AI.ENDPOINT) return null;
  return new HttpTextGenerationClient({
    endpoint: CONFIG.AI.ENDPOINT,
    apiKey: CONFIG.AI.API_KEY,
    model: CONFIG.AI.MODEL,
  });
}

export function createContainer(overrides: ContainerOverrides = {}): Container {
  const container = new Container();

  container.bind<ObjectiveManagerConfig>(TYPES.ObjectiveManagerConfig).toConstantValue({
    maxActiveObjectives: CONFIG.OBJECTIVES.MAX_ACTIVE,
    maxImmediateObjectives: CONFIG.OBJECTIVES.MAX_IMMEDIATE,
    maxShortTermObjectives: CONFIG.OBJECTIVES.MAX_SHORT_TERM,
    autoCleanupCompleted: CONFIG.OBJECTIVES.AUTO_CLEANUP_COMPLETED,
    autoCleanupAfterHours: CONFIG.OBJECTIVES.AUTO_CLEANUP_AFTER_HOURS,
    ...overrides.objectives,
  });
  container.bind<AICoordinatorConfig>(TYPES.AICoordinatorConfig).toConstantValue({
    enabled: CONFIG.AI.ENABLED,
    mode: CONFIG.AI.MODE,
    timeoutMs: CONFIG.AI.TIMEOUT_MS,
    confidenceThreshold: CONFIG.AI.CONFIDENCE_THRESHOLD,
    maxSuggestions: CONFIG.AI.MAX_SUGGESTIONS,
    ...overrides.ai,
  });
  container.bind<DifficultyConfig>(TYPES.DifficultyConfig).toConstantValue({
    targetSuccessRate: CONFIG.DIFFICULTY.TARGET_SUCCESS_RATE,
    sensitivity: CONFIG.DIFFICULTY.SENSITIVITY,
    window: CONFIG.DIFFICULTY.WINDOW,
    ...overrides.difficulty,
  });

  const textClient =
    overrides.textClient === undefined ? defaultTextClient() : overrides.textClient;
  if (textClient) {
    container.bind<TextGenerationClient>(TYPES.TextGenerationClient).toConstantValue(textClient);
  }

  container
    .bind<ObjectiveRegistry>(TYPES.ObjectiveRegistry)
    .to(ObjectiveRegistry)
    .inSingletonScope();
  container
    .bind<ObjectiveEventBus>(TYPES.ObjectiveEventBus)
    .to(ObjectiveEventBus)
    .inSingletonScope();
  container
    .bind<ObjectiveManager>(TYPES.ObjectiveManager)
    .to(ObjectiveManager)
    .inSingletonScope();

  container
    .bind<AchievementManager>(TYPES.AchievementManager)
    .to(AchievementManager)
    .inSingletonScope();

  container
    .bind<AIObjectiveGenerator>(TYPES.AIObjectiveGenerator)
    .to(AIObjectiveGenerator)
    .inSingletonScope();
  container
    .bind<DynamicDifficultyAdjuster>(TYPES.DynamicDifficultyAdjuster)
    .to(DynamicDifficultyAdjuster)
    .inSingletonScope();
  container
    .bind<AIObjectiveCoordinator>(TYPES.AIObjectiveCoordinator)
    .to(AIObjectiveCoordinator)
    .inSingletonScope();

  container
    .bind<ObjectiveController>(TYPES.ObjectiveController)
    .to(ObjectiveController)
    .inSingletonScope();
  container
    .bind<AchievementController>(TYPES.AchievementController)
    .to(AchievementController)
    .inSingletonScope();

  wireObjectiveServices(container);
  return container;
}

/**
 * Connects the coordinator to the manager: it answers suggestion requests,
 * learns from every finished objective and tunes objectives as they activate.
 *
 * @returns Function that undoes the wiring
 */
export function wireObjectiveServices(container: Container): () => void {
  const manager = container.get<ObjectiveManager>(TYPES.ObjectiveManager);
  const eventBus = container.get<ObjectiveEventBus>(TYPES.ObjectiveEventBus);
  const coordinator = container.get<AIObjectiveCoordinator>(TYPES.AIObjectiveCoordinator);

  const recordOutcome = (completed: boolean) => (event: ObjectiveBusEvent) => {
    const objectiveId = readString(event.data.objectiveId);
    const objective = manager.getObjective(objectiveId);
    coordinator.recordOutcome({
      objectiveId,
      completed,
      objectiveType: objective?.objectiveType,
      difficultyLevel:
        objective === undefined ? undefined : readNumber(objective.metadata.difficultyLevel, 3),
    });
  };

  const unsubscribers = [
    manager.registerSuggestionProvider((state, active) =>
      coordinator.getSuggestions(state, active),
    ),
    eventBus.subscribe(ObjectiveEventType.OBJECTIVE_COMPLETED, recordOutcome(true)),
    eventBus.subscribe(ObjectiveEventType.OBJECTIVE_FAILED, recordOutcome(false)),
    eventBus.subscribe(ObjectiveEventType.OBJECTIVE_ACTIVATED, (event) => {
      coordinator.handleActivation(readString(event.data.objectiveId));
    }),
  ];

  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe();
  };
}

export const container = createContainer();
