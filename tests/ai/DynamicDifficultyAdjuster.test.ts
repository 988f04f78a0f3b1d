import { describe, it, expect, beforeEach } from "vitest";
import {
  DEFAULT_DIFFICULTY_CONFIG,
  DIFFICULTY_MODIFIER_SOURCE,
  DynamicDifficultyAdjuster,
} from "../../src/domain/ai/DynamicDifficultyAdjuster";
import { ShortTermObjective } from "../../src/domain/objectives/layered/ShortTermObjective";
import { SanityDependentObjective } from "../../src/domain/objectives/sanity/SanityDependentObjective";
import {
  ObjectivePriority,
  ObjectiveScope,
  ObjectiveType,
} from "../../src/shared/constants/ObjectiveEnums";
import { SuggestionSource } from "../../src/shared/constants/AIEnums";
import type { AIObjectiveSuggestion, ObjectiveOutcomeRecord } from "../../src/domain/types/ai";

function outcomes(pattern: string): ObjectiveOutcomeRecord[] {
  return [...pattern].map((c, i) => ({ objectiveId: `o${i}`, completed: c === "1" }));
}

describe("DynamicDifficultyAdjuster", () => {
  let adjuster: DynamicDifficultyAdjuster;

  beforeEach(() => {
    adjuster = new DynamicDifficultyAdjuster(DEFAULT_DIFFICULTY_CONFIG);
  });

  describe("analyzePerformance", () => {
    it("debe devolver valores neutros sin historial", () => {
      expect(adjuster.analyzePerformance([])).toEqual({
        successRate: 0.5,
        averageDifficulty: 3,
        trend: 0,
        sampleSize: 0,
      });
    });

    it("debe mirar solo la ventana más reciente", () => {
      const analysis = adjuster.analyzePerformance(outcomes("000000000011"));

      expect(analysis.sampleSize).toBe(10);
      expect(analysis.successRate).toBeCloseTo(0.2, 10);
    });

    it("debe calcular la tendencia entre mitades", () => {
      const analysis = adjuster.analyzePerformance(outcomes("0000011111"));

      expect(analysis.successRate).toBe(0.5);
      expect(analysis.trend).toBe(1);
    });

    it("no debe calcular tendencia con menos de cinco resultados", () => {
      expect(adjuster.analyzePerformance(outcomes("0011")).trend).toBe(0);
    });

    it("debe promediar la dificultad registrada", () => {
      const analysis = adjuster.analyzePerformance([
        { completed: true, difficultyLevel: 2 },
        { completed: false, difficultyLevel: 5 },
        { completed: true },
      ]);

      expect(analysis.averageDifficulty).toBeCloseTo(10 / 3, 10);
    });
  });

  describe("calculateAdjustment", () => {
    it("debe endurecer cuando el jugador gana de más", () => {
      expect(adjuster.calculateAdjustment({ successRate: 0.9, trend: 0 })).toBeCloseTo(-0.04, 10);
    });

    it("debe facilitar cuando el jugador pierde de más", () => {
      expect(adjuster.calculateAdjustment({ successRate: 0.5, trend: 0 })).toBeCloseTo(0.04, 10);
    });

    it("debe contrarrestar la tendencia", () => {
      expect(adjuster.calculateAdjustment({ successRate: 0.5, trend: 1 })).toBeCloseTo(-0.06, 10);
    });

    it("debe acotar el ajuste entre -1 y 1", () => {
      const sensitive = new DynamicDifficultyAdjuster({ ...DEFAULT_DIFFICULTY_CONFIG, sensitivity: 5 });

      expect(sensitive.calculateAdjustment({ successRate: 0, trend: -1 })).toBe(1);
      expect(sensitive.calculateAdjustment({ successRate: 1, trend: 1 })).toBe(-1);
    });
  });

  describe("adjustObjective", () => {
    it("debe facilitar un objetivo de escena", () => {
      const objective = new ShortTermObjective("scene");

      adjuster.adjustObjective(objective, 0.6);

      expect(objective.timeLimitMs).toBe(1_560_000);
      expect(objective.definedTimeLimitMs).toBe(1_200_000);
      expect(objective.priority).toBe(ObjectivePriority.LOW);
      expect(objective.getMilestoneCount()).toBe(2);
    });

    it("debe endurecer reemplazando el ajuste anterior", () => {
      const objective = new ShortTermObjective("scene");
      adjuster.adjustObjective(objective, 0.6);

      adjuster.adjustObjective(objective, -0.6);

      expect(objective.modifiers.size).toBe(1);
      expect(objective.modifiers.get(DIFFICULTY_MODIFIER_SOURCE)?.timeLimitFactor).toBeCloseTo(
        0.82,
        10,
      );
      expect(objective.timeLimitMs).toBe(984_000);
      expect(objective.priority).toBe(ObjectivePriority.HIGH);
    });

    it("debe mover el riesgo de cordura dentro de sus límites", () => {
      const easier = new SanityDependentObjective("easier", { sanRiskLevel: 4 });
      const harder = new SanityDependentObjective("harder", { sanRiskLevel: 4 });

      adjuster.adjustObjective(easier, 0.5);
      adjuster.adjustObjective(harder, -1);

      expect(easier.sanRiskLevel).toBe(3);
      expect(harder.sanRiskLevel).toBe(5);
    });

    it("no debe tocar objetivos terminales", () => {
      const objective = new ShortTermObjective("scene");
      objective.abandon();

      adjuster.adjustObjective(objective, 0.6);

      expect(objective.modifiers.size).toBe(0);
      expect(objective.getMilestoneCount()).toBe(3);
    });
  });

  it("debe alargar la duración estimada de sugerencias más fáciles", () => {
    const suggestion: AIObjectiveSuggestion = {
      kind: "short_term",
      title: "Ensure Safety",
      description: "",
      objectiveType: ObjectiveType.SURVIVAL,
      priority: ObjectivePriority.HIGH,
      scope: ObjectiveScope.SHORT_TERM,
      estimatedDurationMinutes: 60,
      confidence: 0.9,
      reasoning: "",
      contextFactors: [],
      source: SuggestionSource.STORY_PACING,
      options: {},
    };

    expect(adjuster.adjustSuggestion(suggestion, 0.5).estimatedDurationMinutes).toBeCloseTo(69, 10);
    expect(adjuster.adjustSuggestion(suggestion, -0.5).estimatedDurationMinutes).toBeCloseTo(54, 10);
    expect(suggestion.estimatedDurationMinutes).toBe(60);
  });
});
