import { inject, injectable } from "inversify";

import { TYPES } from "@/config/Types";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { clamp } from "@/shared/utils/snapshotUtils";
import type {
  AIObjectiveSuggestion,
  DifficultyConfig,
  ObjectiveOutcomeRecord,
  PerformanceAnalysis,
} from "../types/ai";
import type { Objective } from "../objectives/core/Objective";
import { ShortTermObjective } from "../objectives/layered/ShortTermObjective";
import { SanityIntegratedObjective } from "../objectives/sanity/SanityIntegratedObjective";

export const DIFFICULTY_MODIFIER_SOURCE = "difficulty";

const DEFAULT_DIFFICULTY = 3;
const MIN_TREND_SAMPLE = 5;
const MAX_SAN_RISK = 5;
const STRONG_ADJUSTMENT = 0.5;

export const DEFAULT_DIFFICULTY_CONFIG: DifficultyConfig = {
  targetSuccessRate: 0.7,
  sensitivity: 0.1,
  window: 10,
};

function successRate(outcomes: readonly ObjectiveOutcomeRecord[]): number {
  return outcomes.filter((o) => o.completed).length / outcomes.length;
}

/**
 * Tunes objectives toward a target success rate. A positive adjustment makes
 * things easier, a negative one harder; both stay within [-1, 1].
 */
@injectable()
export class DynamicDifficultyAdjuster {
  private readonly config: DifficultyConfig;

  constructor(@inject(TYPES.DifficultyConfig) config: DifficultyConfig) {
    this.config = { ...DEFAULT_DIFFICULTY_CONFIG, ...config };
  }

  getConfig(): Readonly<DifficultyConfig> {
    return this.config;
  }

  /**
   * Looks at the most recent outcomes only. Trend is the success rate of the
   * newer half minus the older half, and stays 0 under five samples.
   */
  analyzePerformance(history: readonly ObjectiveOutcomeRecord[]): PerformanceAnalysis {
    const recent = this.config.window > 0 ? history.slice(-this.config.window) : [];
    if (recent.length === 0) {
      return { successRate: 0.5, averageDifficulty: DEFAULT_DIFFICULTY, trend: 0, sampleSize: 0 };
    }

    const averageDifficulty =
      recent.reduce((sum, o) => sum + (o.difficultyLevel ?? DEFAULT_DIFFICULTY), 0) /
      recent.length;

    let trend = 0;
    if (recent.length >= MIN_TREND_SAMPLE) {
      const half = Math.floor(recent.length / 2);
      trend = successRate(recent.slice(half)) - successRate(recent.slice(0, half));
    }

    return {
      successRate: successRate(recent),
      averageDifficulty,
      trend,
      sampleSize: recent.length,
    };
  }

  calculateAdjustment(performance: Pick<PerformanceAnalysis, "successRate" | "trend">): number {
    const { sensitivity, targetSuccessRate } = this.config;
    const base = -(performance.successRate - targetSuccessRate) * sensitivity * 2;
    const fromTrend = -performance.trend * sensitivity;
    return clamp(base + fromTrend, -1, 1);
  }

  /**
   * Applies the adjustment through the objective's modifier stack, plus the
   * milestone target and SAN risk of the variants that have them. The time
   * limit and priority part replaces any earlier difficulty modifier.
   */
  adjustObjective(objective: Objective, adjustment: number): Objective {
    if (objective.isTerminal) return objective;

    const timeLimitFactor = adjustment > 0 ? 1 + adjustment * 0.5 : 1 + adjustment * 0.3;
    let priorityDelta = 0;
    if (adjustment < -STRONG_ADJUSTMENT) priorityDelta = 1;
    else if (adjustment > STRONG_ADJUSTMENT) priorityDelta = -1;

    objective.modifiers.apply({
      source: DIFFICULTY_MODIFIER_SOURCE,
      timeLimitFactor,
      priorityDelta,
    });

    const count = objective instanceof ShortTermObjective ? objective.getMilestoneCount() : 0;
    if (objective instanceof ShortTermObjective && count > 0) {
      objective.setMilestoneCount(
        adjustment > 0
          ? Math.max(1, Math.trunc(count * (1 - adjustment * 0.3)))
          : Math.trunc(count * (1 - adjustment * 0.2)),
      );
    }

    if (objective instanceof SanityIntegratedObjective) {
      const risk = objective.sanRiskLevel;
      objective.sanRiskLevel =
        adjustment > 0
          ? Math.max(1, Math.trunc(risk * (1 - adjustment * 0.4)))
          : Math.min(MAX_SAN_RISK, Math.trunc(risk * (1 - adjustment * 0.3)));
    }

    logger.debug(
      `Difficulty adjustment ${adjustment.toFixed(3)} applied to ${objective.objectiveId}`,
      LogCategory.AI,
    );
    return objective;
  }

  /**
   * Easier means more time to spend on it.
   */
  adjustSuggestion(suggestion: AIObjectiveSuggestion, adjustment: number): AIObjectiveSuggestion {
    const factor = adjustment > 0 ? 1 + adjustment * 0.3 : 1 + adjustment * 0.2;
    return {
      ...suggestion,
      estimatedDurationMinutes: suggestion.estimatedDurationMinutes * factor,
    };
  }
}
