import { inject, injectable, optional } from "inversify";
import { z } from "zod";

import { TYPES } from "@/config/Types";
import {
  DifficultyLevel,
  PlayerBehaviorPattern,
  SuggestionSource,
} from "@/shared/constants/AIEnums";
import {
  ObjectiveKind,
  ObjectivePriority,
  ObjectiveScope,
  ObjectiveType,
} from "@/shared/constants/ObjectiveEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { errorMessage } from "@/shared/utils/snapshotUtils";
import type { GameStateSnapshot } from "../types/game-types";
import type {
  AICoordinatorConfig,
  AIObjectiveSuggestion,
  GameContextAnalysis,
  ObjectiveOutcomeRecord,
  PlayerAnalysis,
  SessionRecord,
} from "../types/ai";
import type { Objective } from "../objectives/core/Objective";
import type { TextGenerationClient } from "./TextGenerationClient";

const DIFFICULTY_LEVELS: readonly DifficultyLevel[] = [
  DifficultyLevel.VERY_EASY,
  DifficultyLevel.EASY,
  DifficultyLevel.NORMAL,
  DifficultyLevel.HARD,
  DifficultyLevel.VERY_HARD,
  DifficultyLevel.NIGHTMARE,
];

/**
 * Types every balanced objective list should carry, in suggestion order.
 */
const ESSENTIAL_TYPES: readonly ObjectiveType[] = [
  ObjectiveType.INVESTIGATION,
  ObjectiveType.EXPLORATION,
  ObjectiveType.SOCIAL,
  ObjectiveType.SURVIVAL,
];

const LOW_TENSION = 2;
const HIGH_TENSION = 4;
const SECONDARY_PATTERN_COUNT = 2;

const analysisResponseSchema = z.object({
  primaryPattern: z.nativeEnum(PlayerBehaviorPattern),
  reasoning: z.string().optional(),
});

type ActionCounts = Map<string, number>;

function countOf(counts: ActionCounts, type: string): number {
  return counts.get(type) ?? 0;
}

function average(values: readonly number[], fallback: number): number {
  if (values.length === 0) return fallback;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Builds objective suggestions from story pacing, the player's observed
 * habits and the objective types missing from the active list.
 *
 * Behavior analysis is heuristic. When a text generation client is bound,
 * its answer may replace the primary pattern; a slow, failing or malformed
 * answer leaves the heuristic result in place.
 */
@injectable()
export class AIObjectiveGenerator {
  private playerAnalysis: PlayerAnalysis | null = null;

  constructor(
    @inject(TYPES.AICoordinatorConfig)
    private readonly config: AICoordinatorConfig,
    @inject(TYPES.TextGenerationClient)
    @optional()
    private readonly textClient?: TextGenerationClient,
  ) {}

  getPlayerAnalysis(): PlayerAnalysis | null {
    return this.playerAnalysis;
  }

  setPlayerAnalysis(analysis: PlayerAnalysis | null): void {
    this.playerAnalysis = analysis;
  }

  // ==================== Player analysis ====================

  async analyzePlayerBehavior(
    sessions: readonly SessionRecord[],
    outcomes: readonly ObjectiveOutcomeRecord[],
  ): Promise<PlayerAnalysis> {
    const counts: ActionCounts = new Map();
    const riskLevels: number[] = [];
    let explorationActions = 0;
    let socialActions = 0;

    for (const session of sessions) {
      for (const action of session.actions ?? []) {
        counts.set(action.type, countOf(counts, action.type) + 1);
        if (action.riskLevel !== undefined) riskLevels.push(action.riskLevel);
        if (action.type.includes("explore") || action.type.includes("investigate")) {
          explorationActions++;
        }
        if (action.type.includes("talk") || action.type.includes("social")) {
          socialActions++;
        }
      }
    }

    const totalActions = [...counts.values()].reduce((sum, n) => sum + n, 0);
    const divisor = Math.max(totalActions, 1);
    const riskTolerance = average(riskLevels, 0.5);
    const explorationPreference = explorationActions / divisor;
    const socialEngagement = socialActions / divisor;
    const completionRate = average(
      outcomes.map((o) => (o.completed ? 1 : 0)),
      0.5,
    );

    const ranked = this.rankPatterns(counts, divisor, riskTolerance, explorationPreference);
    let primaryPattern = ranked[0] ?? PlayerBehaviorPattern.CAUTIOUS;

    const refined = await this.refinePrimaryPattern(
      counts,
      riskTolerance,
      explorationPreference,
      socialEngagement,
    );
    if (refined !== null) primaryPattern = refined;

    return {
      primaryPattern,
      secondaryPatterns: ranked
        .filter((p) => p !== primaryPattern)
        .slice(0, SECONDARY_PATTERN_COUNT),
      riskTolerance,
      explorationPreference,
      socialEngagement,
      horrorTolerance: this.horrorTolerance(sessions),
      completionRate,
      averageSessionTime: average(
        sessions.map((s) => s.durationHours ?? 1),
        1,
      ),
      preferredDifficulty: this.preferredDifficulty(outcomes),
      adaptiveNeeds: this.adaptiveNeeds(
        totalActions,
        completionRate,
        socialEngagement,
        explorationPreference,
      ),
    };
  }

  /**
   * Heuristic patterns from best to worst score. Ties keep declaration order.
   */
  private rankPatterns(
    counts: ActionCounts,
    divisor: number,
    riskTolerance: number,
    explorationPreference: number,
  ): PlayerBehaviorPattern[] {
    const scores: Array<[PlayerBehaviorPattern, number]> = [
      [PlayerBehaviorPattern.CAUTIOUS, countOf(counts, "careful_action") / divisor + (1 - riskTolerance)],
      [PlayerBehaviorPattern.AGGRESSIVE, countOf(counts, "bold_action") / divisor + riskTolerance],
      [
        PlayerBehaviorPattern.INVESTIGATIVE,
        (countOf(counts, "investigate") + countOf(counts, "analyze")) / divisor,
      ],
      [PlayerBehaviorPattern.SOCIAL, countOf(counts, "talk") / divisor],
      [PlayerBehaviorPattern.EXPLORER, explorationPreference],
      [
        PlayerBehaviorPattern.SURVIVAL,
        (countOf(counts, "flee") + countOf(counts, "hide")) / divisor,
      ],
    ];

    return scores
      .map(([pattern, score], index) => ({ pattern, score, index }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .map((entry) => entry.pattern);
  }

  private horrorTolerance(sessions: readonly SessionRecord[]): number {
    let encounters = 0;
    let completions = 0;
    for (const session of sessions) {
      for (const event of session.events ?? []) {
        if (event.type !== "horror_encounter") continue;
        encounters++;
        if (event.completed) completions++;
      }
    }
    return encounters > 0 ? completions / encounters : 0.5;
  }

  /**
   * Level with the best completion rate weighted by the level itself, so a
   * harder level with a decent rate beats an easy one with a perfect rate.
   */
  private preferredDifficulty(outcomes: readonly ObjectiveOutcomeRecord[]): DifficultyLevel {
    const byLevel = new Map<DifficultyLevel, { total: number; completed: number }>();
    for (const outcome of outcomes) {
      const level =
        DIFFICULTY_LEVELS.find((l) => l === outcome.difficultyLevel) ?? DifficultyLevel.NORMAL;
      const entry = byLevel.get(level) ?? { total: 0, completed: 0 };
      entry.total++;
      if (outcome.completed) entry.completed++;
      byLevel.set(level, entry);
    }

    let best = DifficultyLevel.NORMAL;
    let bestScore = 0;
    for (const [level, entry] of byLevel) {
      const score = (entry.completed / entry.total) * level;
      if (score > bestScore) {
        bestScore = score;
        best = level;
      }
    }
    return best;
  }

  private adaptiveNeeds(
    totalActions: number,
    completionRate: number,
    socialEngagement: number,
    explorationPreference: number,
  ): string[] {
    const needs: string[] = [];
    if (completionRate < 0.3) needs.push("easier_objectives");
    else if (completionRate > 0.9) needs.push("harder_objectives");

    // No actions observed yet: nothing to say about habits.
    if (totalActions === 0) return needs;
    if (socialEngagement < 0.1) needs.push("social_prompts");
    if (explorationPreference < 0.2) needs.push("exploration_encouragement");
    return needs;
  }

  private async refinePrimaryPattern(
    counts: ActionCounts,
    riskTolerance: number,
    explorationPreference: number,
    socialEngagement: number,
  ): Promise<PlayerBehaviorPattern | null> {
    if (!this.textClient) return null;

    const prompt = [
      "Analyze this player's behavior in a cosmic horror investigation game.",
      `Action distribution: ${JSON.stringify(Object.fromEntries(counts))}`,
      `Risk tolerance: ${riskTolerance.toFixed(2)} (0=cautious, 1=reckless)`,
      `Exploration preference: ${explorationPreference.toFixed(2)}`,
      `Social engagement: ${socialEngagement.toFixed(2)}`,
      `Pick the primary pattern from: ${Object.values(PlayerBehaviorPattern).join(", ")}.`,
      'Answer with JSON only: {"primaryPattern": "...", "reasoning": "..."}',
    ].join("\n");

    // Clients that ignore the signal still lose the race against the timer.
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new Error(`timed out after ${this.config.timeoutMs}ms`));
      }, this.config.timeoutMs);
    });
    try {
      const text = await Promise.race([
        this.textClient.generate(prompt, { signal: controller.signal }),
        timedOut,
      ]);
      const start = text.indexOf("{");
      const end = text.lastIndexOf("}");
      if (start === -1 || end < start) {
        logger.warn("AI analysis response contained no JSON object", LogCategory.AI);
        return null;
      }

      const parsed = analysisResponseSchema.safeParse(JSON.parse(text.slice(start, end + 1)));
      if (!parsed.success) {
        logger.warn("AI analysis response had no usable primaryPattern", LogCategory.AI);
        return null;
      }
      return parsed.data.primaryPattern;
    } catch (error) {
      logger.warn(
        `AI-enhanced player analysis unavailable: ${errorMessage(error)}`,
        LogCategory.AI,
      );
      return null;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  // ==================== Suggestions ====================

  /**
   * Merges story, player and missing-type candidates, drops the ones under
   * the confidence threshold and returns the most confident first.
   */
  generateSuggestions(
    state: GameStateSnapshot,
    currentObjectives: readonly Objective[],
    context: GameContextAnalysis,
    limit: number = this.config.maxSuggestions,
  ): AIObjectiveSuggestion[] {
    const candidates: Array<AIObjectiveSuggestion | null> = [
      ...this.storyDrivenSuggestions(context),
      ...this.playerDrivenSuggestions(currentObjectives, context),
      ...this.missingTypes(currentObjectives).map((type) =>
        this.contextualSuggestion(type, context),
      ),
    ];

    const seen = new Set<string>();
    const suggestions: AIObjectiveSuggestion[] = [];
    for (const candidate of candidates) {
      if (candidate === null) continue;
      if (candidate.confidence < this.config.confidenceThreshold) continue;
      if (seen.has(candidate.title)) continue;
      seen.add(candidate.title);
      suggestions.push(candidate);
    }

    logger.debug(
      `Generated ${suggestions.length} suggestion candidates for ${state.currentLocation ?? "unknown location"}`,
      LogCategory.AI,
    );
    return suggestions
      .sort((a, b) => b.confidence - a.confidence)
      .slice(0, Math.max(0, limit));
  }

  private storyDrivenSuggestions(
    context: GameContextAnalysis,
  ): Array<AIObjectiveSuggestion | null> {
    const suggestions: Array<AIObjectiveSuggestion | null> = [];

    if (context.tension < LOW_TENSION) {
      suggestions.push(this.tensionSuggestion(context));
    } else if (context.tension > HIGH_TENSION) {
      suggestions.push(this.survivalSuggestion(context, SuggestionSource.STORY_PACING));
    }

    if (context.storyPhase === "investigation" || context.storyPhase === "discovery") {
      suggestions.push(this.investigationSuggestion(context, SuggestionSource.STORY_PACING));
    }

    if (context.npcsPresent.length > 0 && context.storyPhase !== "action") {
      suggestions.push(this.socialSuggestion(context, SuggestionSource.STORY_PACING));
    }
    return suggestions;
  }

  private playerDrivenSuggestions(
    currentObjectives: readonly Objective[],
    context: GameContextAnalysis,
  ): Array<AIObjectiveSuggestion | null> {
    const analysis = this.playerAnalysis;
    if (analysis === null) return [];

    const suggestions: Array<AIObjectiveSuggestion | null> = [];
    if (analysis.adaptiveNeeds.includes("social_prompts")) {
      suggestions.push(this.socialSuggestion(context, SuggestionSource.PLAYER_PREFERENCE));
    }
    if (
      analysis.primaryPattern === PlayerBehaviorPattern.INVESTIGATIVE &&
      !currentObjectives.some((o) => o.objectiveType === ObjectiveType.KNOWLEDGE)
    ) {
      suggestions.push(this.knowledgeSuggestion());
    }
    return suggestions;
  }

  private missingTypes(currentObjectives: readonly Objective[]): ObjectiveType[] {
    const present = new Set(
      currentObjectives.filter((o) => o.isActive).map((o) => o.objectiveType),
    );
    return ESSENTIAL_TYPES.filter((type) => !present.has(type));
  }

  private contextualSuggestion(
    type: ObjectiveType,
    context: GameContextAnalysis,
  ): AIObjectiveSuggestion | null {
    switch (type) {
      case ObjectiveType.EXPLORATION:
        return this.explorationSuggestion();
      case ObjectiveType.SOCIAL:
        return this.socialSuggestion(context, SuggestionSource.MISSING_TYPE);
      case ObjectiveType.INVESTIGATION:
        return this.investigationSuggestion(context, SuggestionSource.MISSING_TYPE);
      case ObjectiveType.SURVIVAL:
        return this.survivalSuggestion(context, SuggestionSource.MISSING_TYPE);
      default:
        return null;
    }
  }

  private tensionSuggestion(context: GameContextAnalysis): AIObjectiveSuggestion {
    return {
      kind: ObjectiveKind.SHORT_TERM,
      title: "Investigate Disturbing Sounds",
      description: "Strange noises coming from nearby demand investigation",
      objectiveType: ObjectiveType.INVESTIGATION,
      priority: ObjectivePriority.NORMAL,
      scope: ObjectiveScope.SHORT_TERM,
      estimatedDurationMinutes: 10,
      confidence: 0.8,
      reasoning: "Story needs tension increase",
      contextFactors: ["low_tension", "story_pacing"],
      source: SuggestionSource.STORY_PACING,
      options: {
        tensionRampEnabled: true,
        initialTension: context.tension + 1,
      },
    };
  }

  private investigationSuggestion(
    context: GameContextAnalysis,
    source: SuggestionSource,
  ): AIObjectiveSuggestion {
    return {
      kind: ObjectiveKind.SHORT_TERM,
      title: `Examine ${context.locationType}`,
      description: `Carefully investigate the ${context.locationType} for clues`,
      objectiveType: ObjectiveType.INVESTIGATION,
      priority: ObjectivePriority.NORMAL,
      scope: ObjectiveScope.SHORT_TERM,
      estimatedDurationMinutes: 15,
      confidence: 0.7,
      reasoning: "Investigation needed for story progression",
      contextFactors: ["location_type", "story_phase"],
      source,
      options: {
        requiredDiscoveries: [`examine_${context.locationType}`, "find_clue"],
        milestoneCount: 2,
      },
    };
  }

  /**
   * Needs someone to talk to; null when no NPC is around.
   */
  private socialSuggestion(
    context: GameContextAnalysis,
    source: SuggestionSource,
  ): AIObjectiveSuggestion | null {
    const npc = context.npcsPresent[0];
    if (npc === undefined) return null;

    return {
      kind: ObjectiveKind.IMMEDIATE,
      title: `Speak with ${npc}`,
      description: `Engage ${npc} in conversation to gather information`,
      objectiveType: ObjectiveType.SOCIAL,
      priority: ObjectivePriority.NORMAL,
      scope: ObjectiveScope.IMMEDIATE,
      estimatedDurationMinutes: 5,
      confidence: 0.8,
      reasoning: "NPC available for interaction",
      contextFactors: ["npcs_present", "social_opportunity"],
      source,
      options: {
        requiredActions: ["initiate_conversation", "ask_questions", "conclude_conversation"],
        metadata: { npcName: npc },
      },
    };
  }

  private explorationSuggestion(): AIObjectiveSuggestion {
    return {
      kind: ObjectiveKind.SHORT_TERM,
      title: "Explore Nearby Areas",
      description: "Survey the surrounding area for points of interest",
      objectiveType: ObjectiveType.EXPLORATION,
      priority: ObjectivePriority.LOW,
      scope: ObjectiveScope.SHORT_TERM,
      estimatedDurationMinutes: 12,
      confidence: 0.6,
      reasoning: "Exploration provides context and opportunities",
      contextFactors: ["location_context", "exploration_opportunities"],
      source: SuggestionSource.MISSING_TYPE,
      options: {
        requiredDiscoveries: ["survey_area", "identify_landmarks", "note_features"],
        milestoneCount: 3,
      },
    };
  }

  private survivalSuggestion(
    context: GameContextAnalysis,
    source: SuggestionSource,
  ): AIObjectiveSuggestion {
    return {
      kind: ObjectiveKind.SHORT_TERM,
      title: "Ensure Safety",
      description: "Take measures to ensure your continued safety",
      objectiveType: ObjectiveType.SURVIVAL,
      priority: ObjectivePriority.HIGH,
      scope: ObjectiveScope.SHORT_TERM,
      estimatedDurationMinutes: 8,
      confidence: 0.9,
      reasoning: "Survival is always a priority in cosmic horror",
      contextFactors: ["threat_level", "safety_concerns"],
      source,
      options: {
        tensionRampEnabled: true,
        initialTension: Math.max(1, context.threatLevel),
        maxTension: 5,
      },
    };
  }

  private knowledgeSuggestion(): AIObjectiveSuggestion {
    return {
      kind: ObjectiveKind.MID_TERM,
      title: "Uncover Hidden Knowledge",
      description: "Seek out forbidden knowledge related to current events",
      objectiveType: ObjectiveType.KNOWLEDGE,
      priority: ObjectivePriority.NORMAL,
      scope: ObjectiveScope.MID_TERM,
      estimatedDurationMinutes: 30,
      confidence: 0.7,
      reasoning: "Knowledge objectives satisfy investigative players",
      contextFactors: ["cosmic_exposure", "knowledge_opportunities"],
      source: SuggestionSource.PLAYER_PREFERENCE,
      options: {
        horrorRevelations: ["initial_truth", "deeper_understanding"],
      },
    };
  }
}
