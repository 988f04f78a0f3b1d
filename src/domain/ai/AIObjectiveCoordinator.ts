import { inject, injectable } from "inversify";

import { TYPES } from "@/config/Types";
import { AIObjectiveMode } from "@/shared/constants/AIEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  errorMessage,
  readBoolean,
  readNumber,
  readString,
  readStringList,
  toIsoOrNull,
} from "@/shared/utils/snapshotUtils";
import type { GameStateSnapshot } from "../types/game-types";
import type {
  AICoordinatorConfig,
  AIObjectiveSuggestion,
  GameContextAnalysis,
  ObjectiveOutcomeRecord,
  PerformanceAnalysis,
  PlayerAnalysis,
  SessionRecord,
} from "../types/ai";
import type { Objective } from "../objectives/core/Objective";
import type { ObjectiveManager } from "../objectives/ObjectiveManager";
import { deriveSanityState } from "../objectives/sanity/sanityState";
import type { AIObjectiveGenerator } from "./AIObjectiveGenerator";
import type { DynamicDifficultyAdjuster } from "./DynamicDifficultyAdjuster";

const MAX_OUTCOME_HISTORY = 100;
const GENERATED_ID_PREFIX = "ai_generated_";

export interface SuggestionRecord {
  timestamp: number;
  suggestion: AIObjectiveSuggestion;
  implemented: boolean;
  objectiveId: string | null;
}

export interface AICoordinatorStatistics {
  enabled: boolean;
  mode: AIObjectiveMode;
  totalSuggestions: number;
  implementedSuggestions: number;
  implementationRate: number;
  playerAnalysis: PlayerAnalysis | null;
  lastAnalysisTime: string | null;
  performance: PerformanceAnalysis;
  adjustment: number;
}

/**
 * Reads the pacing facts suggestion generation works from. Missing fields get
 * quiet defaults: mid tension, investigation phase, no NPCs.
 */
export function analyzeGameContext(state: GameStateSnapshot): GameContextAnalysis {
  return {
    tension: readNumber(state.tensionLevel, 2),
    storyPhase: readString(state.storyPhase, "investigation"),
    locationType: readString(state.currentLocation, "unknown"),
    npcsPresent: readStringList(state.npcsPresent),
    recentEvents: readStringList(state.recentEvents),
    availableResources: readStringList(state.inventory),
    timePressure: readBoolean(state.timePressure),
    sanityState: deriveSanityState(state),
    cosmicExposure: readNumber(state.cosmicExposure, readNumber(state.cosmicInsight, 0)),
    threatLevel: readNumber(state.threatLevel, 1),
  };
}

/**
 * Connects suggestion generation and difficulty tuning to the objective
 * manager.
 *
 * Modes: `disabled` suggests nothing; `suggestions_only` only suggests;
 * `adaptive` also tunes every objective as it activates; `full_control`
 * additionally turns each suggestion into an objective right away.
 */
@injectable()
export class AIObjectiveCoordinator {
  private playerAnalysis: PlayerAnalysis | null = null;
  private lastAnalysisTime: number | null = null;
  private suggestionHistory: SuggestionRecord[] = [];
  private outcomeHistory: ObjectiveOutcomeRecord[] = [];
  private nextGeneratedId = 0;

  constructor(
    @inject(TYPES.ObjectiveManager) private readonly manager: ObjectiveManager,
    @inject(TYPES.AIObjectiveGenerator) private readonly generator: AIObjectiveGenerator,
    @inject(TYPES.DynamicDifficultyAdjuster)
    private readonly adjuster: DynamicDifficultyAdjuster,
    @inject(TYPES.AICoordinatorConfig) private readonly config: AICoordinatorConfig,
  ) {
    logger.info("AIObjectiveCoordinator initialized", LogCategory.AI, {
      enabled: config.enabled,
      mode: config.mode,
    });
  }

  get mode(): AIObjectiveMode {
    return this.config.enabled ? this.config.mode : AIObjectiveMode.DISABLED;
  }

  get isEnabled(): boolean {
    return this.mode !== AIObjectiveMode.DISABLED;
  }

  private get isAdaptive(): boolean {
    return this.mode === AIObjectiveMode.ADAPTIVE || this.mode === AIObjectiveMode.FULL_CONTROL;
  }

  /**
   * Re-runs behavior analysis. Outcomes default to the ones recorded so far.
   * Never throws: the AI part degrades to the heuristic result.
   */
  async updatePlayerAnalysis(
    sessions: readonly SessionRecord[],
    outcomes: readonly ObjectiveOutcomeRecord[] = this.outcomeHistory,
  ): Promise<PlayerAnalysis> {
    const analysis = await this.generator.analyzePlayerBehavior(sessions, outcomes);
    this.playerAnalysis = analysis;
    this.lastAnalysisTime = Date.now();
    this.generator.setPlayerAnalysis(analysis);
    logger.info(
      `Player analysis updated: primary pattern = ${analysis.primaryPattern}`,
      LogCategory.AI,
    );
    return analysis;
  }

  getPlayerAnalysis(): PlayerAnalysis | null {
    return this.playerAnalysis;
  }

  /**
   * Suggestions for the current turn, durations tuned by recent performance.
   * Defaults to the manager's active objectives.
   */
  async getSuggestions(
    state: GameStateSnapshot,
    currentObjectives: readonly Objective[] = this.manager.getActiveObjectives(),
    limit: number = this.config.maxSuggestions,
  ): Promise<AIObjectiveSuggestion[]> {
    if (!this.isEnabled) return [];

    let suggestions = this.generator.generateSuggestions(
      state,
      currentObjectives,
      analyzeGameContext(state),
      limit,
    );

    if (this.outcomeHistory.length > 0) {
      const adjustment = this.getCurrentAdjustment();
      suggestions = suggestions.map((s) => this.adjuster.adjustSuggestion(s, adjustment));
    }

    const now = Date.now();
    this.suggestionHistory.push(
      ...suggestions.map((suggestion) => ({
        timestamp: now,
        suggestion,
        implemented: false,
        objectiveId: null,
      })),
    );

    if (this.mode === AIObjectiveMode.FULL_CONTROL) {
      for (const suggestion of suggestions) this.implementSuggestion(suggestion);
    }
    return suggestions;
  }

  /**
   * Creates the suggested objective through the manager under the next free
   * `ai_generated_<n>` id. Returns null when creation fails.
   */
  implementSuggestion(suggestion: AIObjectiveSuggestion): Objective | null {
    let objectiveId = `${GENERATED_ID_PREFIX}${this.nextGeneratedId}`;
    while (this.manager.getObjective(objectiveId)) {
      this.nextGeneratedId++;
      objectiveId = `${GENERATED_ID_PREFIX}${this.nextGeneratedId}`;
    }

    let objective: Objective;
    try {
      objective = this.manager.createObjective(suggestion.kind, objectiveId, {
        ...suggestion.options,
        title: suggestion.title,
        description: suggestion.description,
        objectiveType: suggestion.objectiveType,
        scope: suggestion.scope,
        priority: suggestion.priority,
        metadata: {
          ...(suggestion.options.metadata ?? {}),
          aiGenerated: true,
          suggestionSource: suggestion.source,
        },
      });
    } catch (error) {
      logger.error(
        `Failed to implement AI suggestion "${suggestion.title}": ${errorMessage(error)}`,
        LogCategory.AI,
      );
      return null;
    }

    this.nextGeneratedId++;
    const record =
      this.suggestionHistory.find((r) => r.suggestion === suggestion && !r.implemented) ??
      this.suggestionHistory.find((r) => r.suggestion.title === suggestion.title && !r.implemented);
    if (record) {
      record.implemented = true;
      record.objectiveId = objective.objectiveId;
    }

    logger.info(`Implemented AI suggestion: ${suggestion.title}`, LogCategory.AI, {
      objectiveId: objective.objectiveId,
    });
    return objective;
  }

  /**
   * Feeds the rolling window difficulty tuning reads from.
   */
  recordOutcome(outcome: ObjectiveOutcomeRecord): void {
    this.outcomeHistory.push({ ...outcome });
    if (this.outcomeHistory.length > MAX_OUTCOME_HISTORY) {
      this.outcomeHistory = this.outcomeHistory.slice(-MAX_OUTCOME_HISTORY);
    }
  }

  getOutcomeHistory(): readonly ObjectiveOutcomeRecord[] {
    return this.outcomeHistory;
  }

  getCurrentAdjustment(): number {
    return this.adjuster.calculateAdjustment(
      this.adjuster.analyzePerformance(this.outcomeHistory),
    );
  }

  /**
   * Tunes a freshly activated objective in adaptive modes. Returns whether
   * anything was applied.
   */
  handleActivation(objectiveId: string): boolean {
    if (!this.isAdaptive || this.outcomeHistory.length === 0) return false;

    const objective = this.manager.getObjective(objectiveId);
    if (!objective) return false;

    this.adjuster.adjustObjective(objective, this.getCurrentAdjustment());
    return true;
  }

  getSuggestionHistory(): readonly SuggestionRecord[] {
    return this.suggestionHistory;
  }

  getStatistics(): AICoordinatorStatistics {
    const total = this.suggestionHistory.length;
    const implemented = this.suggestionHistory.filter((r) => r.implemented).length;
    const performance = this.adjuster.analyzePerformance(this.outcomeHistory);

    return {
      enabled: this.isEnabled,
      mode: this.mode,
      totalSuggestions: total,
      implementedSuggestions: implemented,
      implementationRate: implemented / Math.max(total, 1),
      playerAnalysis: this.playerAnalysis,
      lastAnalysisTime: toIsoOrNull(this.lastAnalysisTime),
      performance,
      adjustment: this.adjuster.calculateAdjustment(performance),
    };
  }

  reset(): void {
    this.playerAnalysis = null;
    this.lastAnalysisTime = null;
    this.suggestionHistory = [];
    this.outcomeHistory = [];
    this.nextGeneratedId = 0;
    this.generator.setPlayerAnalysis(null);
  }
}
