/**
 * Types shared by the AI suggestion generator, the difficulty adjuster and
 * the coordinator.
 *
 * @module domain/types/ai
 */

import type {
  AIObjectiveMode,
  DifficultyLevel,
  PlayerBehaviorPattern,
  SuggestionSource,
} from "@/shared/constants/AIEnums";
import type {
  ObjectivePriority,
  ObjectiveScope,
  ObjectiveType,
} from "@/shared/constants/ObjectiveEnums";
import type { SanityState } from "@/shared/constants/SanityEnums";
import type { ObjectiveOptions } from "../objectives/schemas";

/**
 * Objective proposed by the generator. `kind` and `options` are exactly what
 * the manager needs to create it.
 */
export interface AIObjectiveSuggestion {
  kind: string;
  title: string;
  description: string;
  objectiveType: ObjectiveType;
  priority: ObjectivePriority;
  scope: ObjectiveScope;
  estimatedDurationMinutes: number;
  /** 0-1 */
  confidence: number;
  reasoning: string;
  contextFactors: string[];
  source: SuggestionSource;
  options: ObjectiveOptions;
}

export interface PlayerAnalysis {
  primaryPattern: PlayerBehaviorPattern;
  secondaryPatterns: PlayerBehaviorPattern[];
  /** 0 cautious, 1 reckless */
  riskTolerance: number;
  explorationPreference: number;
  socialEngagement: number;
  horrorTolerance: number;
  completionRate: number;
  /** Hours */
  averageSessionTime: number;
  preferredDifficulty: DifficultyLevel;
  adaptiveNeeds: string[];
}

export interface GameContextAnalysis {
  /** 1-5 */
  tension: number;
  storyPhase: string;
  locationType: string;
  npcsPresent: string[];
  recentEvents: string[];
  availableResources: string[];
  timePressure: boolean;
  sanityState: SanityState;
  cosmicExposure: number;
  threatLevel: number;
}

export interface SessionActionRecord {
  type: string;
  /** 0-1 */
  riskLevel?: number;
}

export interface SessionEventRecord {
  type: string;
  completed?: boolean;
}

/**
 * One play session as seen by behavior analysis.
 */
export interface SessionRecord {
  actions?: SessionActionRecord[];
  events?: SessionEventRecord[];
  durationHours?: number;
}

/**
 * Outcome of one finished objective, the input of difficulty tuning.
 */
export interface ObjectiveOutcomeRecord {
  objectiveId?: string;
  completed: boolean;
  /** 1-6 */
  difficultyLevel?: number;
  objectiveType?: ObjectiveType;
}

export interface PerformanceAnalysis {
  successRate: number;
  averageDifficulty: number;
  /** Success rate of the newer half minus the older half */
  trend: number;
  sampleSize: number;
}

export interface AICoordinatorConfig {
  enabled: boolean;
  mode: AIObjectiveMode;
  /** Upper bound for one text-generation call */
  timeoutMs: number;
  confidenceThreshold: number;
  maxSuggestions: number;
}

export interface DifficultyConfig {
  targetSuccessRate: number;
  sensitivity: number;
  /** Number of most recent outcomes considered */
  window: number;
}
