import { describe, it, expect } from "vitest";
import { AIObjectiveCoordinator } from "../../src/domain/ai/AIObjectiveCoordinator";
import { AIObjectiveGenerator } from "../../src/domain/ai/AIObjectiveGenerator";
import {
  DEFAULT_DIFFICULTY_CONFIG,
  DIFFICULTY_MODIFIER_SOURCE,
  DynamicDifficultyAdjuster,
} from "../../src/domain/ai/DynamicDifficultyAdjuster";
import {
  DEFAULT_MANAGER_CONFIG,
  ObjectiveManager,
} from "../../src/domain/objectives/ObjectiveManager";
import { ObjectiveRegistry } from "../../src/domain/objectives/ObjectiveRegistry";
import { ObjectiveEventBus } from "../../src/domain/objectives/core/ObjectiveEventBus";
import { createContainer } from "../../src/config/container";
import { TYPES } from "../../src/config/Types";
import { AIObjectiveMode } from "../../src/shared/constants/AIEnums";
import {
  ObjectiveKind,
  ObjectivePriority,
  ObjectiveType,
} from "../../src/shared/constants/ObjectiveEnums";
import type { AICoordinatorConfig } from "../../src/domain/types/ai";

const QUIET_STATE = { tensionLevel: 3, storyPhase: "action" };

function createCoordinator(config: Partial<AICoordinatorConfig> = {}): {
  coordinator: AIObjectiveCoordinator;
  manager: ObjectiveManager;
} {
  const aiConfig: AICoordinatorConfig = {
    enabled: true,
    mode: AIObjectiveMode.SUGGESTIONS_ONLY,
    timeoutMs: 1000,
    confidenceThreshold: 0.6,
    maxSuggestions: 5,
    ...config,
  };
  const manager = new ObjectiveManager(
    new ObjectiveRegistry(),
    new ObjectiveEventBus(),
    DEFAULT_MANAGER_CONFIG,
  );
  const coordinator = new AIObjectiveCoordinator(
    manager,
    new AIObjectiveGenerator(aiConfig),
    new DynamicDifficultyAdjuster(DEFAULT_DIFFICULTY_CONFIG),
    aiConfig,
  );
  return { coordinator, manager };
}

function recordSteadyWins(coordinator: AIObjectiveCoordinator): void {
  for (const c of "1111011110") {
    coordinator.recordOutcome({ completed: c === "1" });
  }
}

describe("AIObjectiveCoordinator", () => {
  it("no debe sugerir nada cuando está desactivado", async () => {
    const { coordinator } = createCoordinator({ enabled: false, mode: AIObjectiveMode.FULL_CONTROL });

    expect(coordinator.mode).toBe(AIObjectiveMode.DISABLED);
    expect(await coordinator.getSuggestions(QUIET_STATE)).toEqual([]);
    expect(coordinator.getSuggestionHistory()).toEqual([]);
  });

  it("debe solo sugerir en modo de sugerencias", async () => {
    const { coordinator, manager } = createCoordinator();

    const suggestions = await coordinator.getSuggestions(QUIET_STATE);

    expect(suggestions.map((s) => s.title)).toEqual([
      "Ensure Safety",
      "Examine unknown",
      "Explore Nearby Areas",
    ]);
    expect(manager.getAllObjectives()).toEqual([]);
    expect(coordinator.getStatistics().totalSuggestions).toBe(3);
    expect(coordinator.getStatistics().implementationRate).toBe(0);
  });

  it("debe crear cada sugerencia en control total", async () => {
    const { coordinator, manager } = createCoordinator({ mode: AIObjectiveMode.FULL_CONTROL });

    await coordinator.getSuggestions(QUIET_STATE);

    expect(manager.getAllObjectives().map((o) => o.objectiveId)).toEqual([
      "ai_generated_0",
      "ai_generated_1",
      "ai_generated_2",
    ]);
    const safety = manager.getObjective("ai_generated_0");
    expect(safety?.title).toBe("Ensure Safety");
    expect(safety?.kind).toBe(ObjectiveKind.SHORT_TERM);
    expect(safety?.priority).toBe(ObjectivePriority.HIGH);
    expect(safety?.metadata).toEqual({ aiGenerated: true, suggestionSource: "missing_type" });

    const stats = coordinator.getStatistics();
    expect(stats.implementedSuggestions).toBe(3);
    expect(stats.implementationRate).toBe(1);
    expect(coordinator.getSuggestionHistory()[1].objectiveId).toBe("ai_generated_1");
  });

  it("debe saltar ids ocupados al implementar", async () => {
    const { coordinator, manager } = createCoordinator();
    manager.createObjective(ObjectiveKind.IMMEDIATE, "ai_generated_0");
    const [suggestion] = await coordinator.getSuggestions(QUIET_STATE);

    const objective = coordinator.implementSuggestion(suggestion);

    expect(objective?.objectiveId).toBe("ai_generated_1");
    expect(coordinator.getSuggestionHistory()[0].implemented).toBe(true);
  });

  it("debe devolver null si la creación falla", async () => {
    const { coordinator } = createCoordinator();
    const [suggestion] = await coordinator.getSuggestions(QUIET_STATE);

    expect(coordinator.implementSuggestion({ ...suggestion, kind: "ritual_circle" })).toBeNull();
    expect(coordinator.getStatistics().implementedSuggestions).toBe(0);
  });

  it("debe ajustar la duración de las sugerencias con el rendimiento", async () => {
    const { coordinator } = createCoordinator();
    recordSteadyWins(coordinator);

    const [safety] = await coordinator.getSuggestions(QUIET_STATE);

    expect(coordinator.getCurrentAdjustment()).toBeCloseTo(-0.02, 10);
    expect(safety.estimatedDurationMinutes).toBeCloseTo(7.968, 10);
  });

  it("debe ajustar objetivos al activarse solo en modos adaptativos", () => {
    const passive = createCoordinator();
    recordSteadyWins(passive.coordinator);
    passive.manager.createObjective(ObjectiveKind.SHORT_TERM, "scene");
    expect(passive.coordinator.handleActivation("scene")).toBe(false);

    const adaptive = createCoordinator({ mode: AIObjectiveMode.ADAPTIVE });
    const scene = adaptive.manager.createObjective(ObjectiveKind.SHORT_TERM, "scene");
    expect(adaptive.coordinator.handleActivation("scene")).toBe(false);

    recordSteadyWins(adaptive.coordinator);
    expect(adaptive.coordinator.handleActivation("missing")).toBe(false);
    expect(adaptive.coordinator.handleActivation("scene")).toBe(true);
    expect(scene.modifiers.get(DIFFICULTY_MODIFIER_SOURCE)?.timeLimitFactor).toBeCloseTo(0.994, 10);
    expect(scene.priority).toBe(ObjectivePriority.NORMAL);
  });

  it("debe conservar solo los últimos 100 resultados", () => {
    const { coordinator } = createCoordinator();
    for (let i = 0; i < 105; i++) {
      coordinator.recordOutcome({ objectiveId: `o${i}`, completed: true });
    }

    const history = coordinator.getOutcomeHistory();
    expect(history).toHaveLength(100);
    expect(history[0].objectiveId).toBe("o5");
  });

  it("debe compartir el análisis del jugador con el generador", async () => {
    const { coordinator } = createCoordinator();

    const analysis = await coordinator.updatePlayerAnalysis([
      { actions: [{ type: "talk" }, { type: "talk" }] },
    ]);

    expect(coordinator.getPlayerAnalysis()).toBe(analysis);
    expect(coordinator.getStatistics().lastAnalysisTime).not.toBeNull();

    coordinator.reset();
    expect(coordinator.getPlayerAnalysis()).toBeNull();
    expect(coordinator.getStatistics().totalSuggestions).toBe(0);
  });
});

describe("wireObjectiveServices", () => {
  it("debe registrar resultados y responder sugerencias a través del gestor", async () => {
    const container = createContainer({
      ai: {
        enabled: true,
        mode: AIObjectiveMode.SUGGESTIONS_ONLY,
        confidenceThreshold: 0.6,
        maxSuggestions: 5,
      },
      textClient: null,
    });
    const manager = container.get<ObjectiveManager>(TYPES.ObjectiveManager);
    const coordinator = container.get<AIObjectiveCoordinator>(TYPES.AIObjectiveCoordinator);

    manager.createObjective(ObjectiveKind.IMMEDIATE, "look", {
      requiredActions: ["look"],
      objectiveType: ObjectiveType.EXPLORATION,
      metadata: { difficultyLevel: 2 },
    });
    manager.updateAllObjectives({});
    manager.updateAllObjectives({}, { actionType: "look" });

    expect(coordinator.getOutcomeHistory()).toEqual([
      {
        objectiveId: "look",
        completed: true,
        objectiveType: ObjectiveType.EXPLORATION,
        difficultyLevel: 2,
      },
    ]);

    const suggestions = await manager.suggestNewObjectives(QUIET_STATE);
    expect(suggestions.map((s) => s.title)).toEqual([
      "Ensure Safety",
      "Examine unknown",
      "Explore Nearby Areas",
    ]);
  });
});
