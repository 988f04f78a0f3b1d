import { z } from "zod";

import {
  ConditionCheck,
  ConsequenceType,
  ObjectivePriority,
  ObjectiveScope,
  ObjectiveStatus,
  ObjectiveType,
  RewardType,
} from "@/shared/constants/ObjectiveEnums";
import { MadnessType, SanityState } from "@/shared/constants/SanityEnums";

/**
 * Validation schemas for objective options and persisted objectives.
 *
 * The same options schema validates HTTP create bodies and the options block
 * stored in save files, so anything accepted here can be rebuilt by the
 * registry.
 *
 * @module domain/objectives/schemas
 */

export const conditionInputSchema = z.object({
  conditionId: z.string().min(1),
  description: z.string().optional(),
  requiredValue: z.unknown().optional(),
  /** Named built-in check; without one the condition compares values */
  check: z.nativeEnum(ConditionCheck).optional(),
  metadata: z.record(z.unknown()).optional(),
});
export type ConditionInput = z.infer<typeof conditionInputSchema>;

export const rewardSchema = z.object({
  type: z.nativeEnum(RewardType),
  value: z.number().default(0),
  description: z.string().default(""),
  metadata: z.record(z.unknown()).optional(),
});
export type ObjectiveReward = z.infer<typeof rewardSchema>;

export const consequenceSchema = z.object({
  type: z.nativeEnum(ConsequenceType),
  severity: z.number().int().min(1).max(10).default(1),
  description: z.string().default(""),
  metadata: z.record(z.unknown()).optional(),
});
export type ObjectiveConsequence = z.infer<typeof consequenceSchema>;

export const storyBeatSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
});
export type StoryBeat = z.infer<typeof storyBeatSchema>;

export const completionPathSchema = z.object({
  description: z.string().optional(),
  requirements: z.object({
    minInvestigationProgress: z.number().min(0).max(1).optional(),
    requiredRevelations: z.array(z.string()).optional(),
    minStoryBeat: z.number().int().min(0).optional(),
  }),
});
export type CompletionPath = z.infer<typeof completionPathSchema>;

export const campaignPhaseSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  completionEffects: z
    .object({
      unlockKnowledge: z.record(z.number()).optional(),
      worldState: z.record(z.unknown()).optional(),
    })
    .optional(),
});
export type CampaignPhase = z.infer<typeof campaignPhaseSchema>;

export const unlockCriteriaSchema = z.object({
  minCampaigns: z.number().optional(),
  minCharacters: z.number().optional(),
  minPlaytime: z.number().optional(),
  requiredPatterns: z.array(z.string()).optional(),
  masteryLevel: z
    .object({ category: z.string(), skill: z.string(), level: z.number() })
    .optional(),
});
export type UnlockCriteria = z.infer<typeof unlockCriteriaSchema>;

export const sanityThresholdsSchema = z.object({
  stable: z.number(),
  stressed: z.number(),
  disturbed: z.number(),
  unhinged: z.number(),
});
export type SanityThresholds = z.infer<typeof sanityThresholdsSchema>;

export const madnessEffectSchema = z.object({
  madnessType: z.nativeEnum(MadnessType),
  severity: z.number().int().min(1).max(5),
  /** Omitted for permanent effects */
  durationHours: z.number().positive().optional(),
  triggers: z.array(z.string()).optional(),
  behavioralChanges: z.record(z.unknown()).optional(),
  objectiveModifications: z
    .object({
      priorityChange: z.number().int().optional(),
      timePressureMinutes: z.number().optional(),
      addCompulsion: z.string().optional(),
    })
    .optional(),
});
export type MadnessEffect = z.infer<typeof madnessEffectSchema>;

export const stateConfigurationSchema = z.object({
  titleSuffix: z.string().optional(),
  descriptionOverride: z.string().optional(),
  priorityModifier: z.number().int().optional(),
  sanLossMultiplier: z.number().optional(),
  completionSanBonus: z.number().optional(),
});
export type StateConfiguration = z.infer<typeof stateConfigurationSchema>;

export const insightLevelSchema = z.object({
  cosmicKnowledgeUnlock: z.array(z.string()).optional(),
  sanityThresholdChange: z.number().optional(),
  specialAbilityUnlock: z.array(z.string()).optional(),
});
export type InsightLevel = z.infer<typeof insightLevelSchema>;

/**
 * Options accepted by every objective kind. Each variant reads the fields it
 * understands and ignores the rest.
 */
export const objectiveOptionsSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  objectiveType: z.nativeEnum(ObjectiveType).optional(),
  scope: z.nativeEnum(ObjectiveScope).optional(),
  priority: z.nativeEnum(ObjectivePriority).optional(),
  /** null removes the variant's default time limit */
  timeLimitMinutes: z.number().nullable().optional(),
  activationConditions: z.array(conditionInputSchema).optional(),
  completionConditions: z.array(conditionInputSchema).optional(),
  rewards: z.array(rewardSchema).optional(),
  consequences: z.array(consequenceSchema).optional(),
  parentObjective: z.string().nullable().optional(),
  childObjectives: z.array(z.string()).optional(),
  metadata: z.record(z.unknown()).optional(),

  requiredActions: z.array(z.string()).optional(),
  autoCompleteOnAction: z.boolean().optional(),
  provideImmediateFeedback: z.boolean().optional(),

  requiredDiscoveries: z.array(z.string()).optional(),
  milestoneCount: z.number().int().min(0).optional(),
  subObjectives: z.array(z.string()).optional(),
  sceneContext: z.record(z.unknown()).optional(),
  tensionRampEnabled: z.boolean().optional(),
  initialTension: z.number().optional(),
  maxTension: z.number().optional(),

  investigationBranches: z.record(z.number()).optional(),
  storyBeats: z.array(storyBeatSchema).optional(),
  skillChallenges: z.record(z.number().int().min(0)).optional(),
  sanLossThreshold: z.number().positive().optional(),
  horrorRevelations: z.array(z.string()).optional(),
  completionPaths: z.record(completionPathSchema).optional(),

  campaignPhases: z.array(campaignPhaseSchema).optional(),
  characterGrowthGoals: z.record(z.number()).optional(),
  mythosKnowledgeLevels: z.record(z.number()).optional(),
  recurringThemes: z.array(z.string()).optional(),
  persistentElements: z.record(z.unknown()).optional(),

  campaignsParticipated: z.array(z.string()).optional(),
  charactersUsed: z.array(z.string()).optional(),
  totalPlaytimeHours: z.number().min(0).optional(),
  masteryCategories: z.record(z.record(z.number())).optional(),
  learnedPatterns: z.array(z.string()).optional(),
  survivalStrategies: z.record(z.number()).optional(),
  unlockCriteria: z.record(unlockCriteriaSchema).optional(),
  unlockedContent: z.array(z.string()).optional(),

  sanityThresholds: sanityThresholdsSchema.optional(),
  requiredSanityState: z.nativeEnum(SanityState).optional(),
  sanRiskLevel: z.number().optional(),
  cosmicInsightRequired: z.number().optional(),
  madnessEffects: z.array(madnessEffectSchema).optional(),
  madnessProtection: z.boolean().optional(),
  potentialSanGain: z.number().optional(),
  stateConfigurations: z
    .record(z.nativeEnum(SanityState), stateConfigurationSchema)
    .optional(),
  insightLevels: z.array(insightLevelSchema).optional(),
  revelationThresholds: z.array(z.number().min(0).max(1)).optional(),
  sanityCostPerInsight: z.number().min(0).optional(),
  insightProtectionThreshold: z.number().optional(),
  requiredMadnessTypes: z.array(z.nativeEnum(MadnessType)).optional(),
  minMadnessSeverity: z.number().optional(),
  madnessProgressMultiplier: z.number().optional(),
  sanityRecoveryOnCompletion: z.number().min(0).optional(),
});
export type ObjectiveOptions = z.infer<typeof objectiveOptionsSchema>;

export const objectiveEventSchema = z.object({
  timestamp: z.string(),
  event_type: z.string(),
  objective_id: z.string(),
  status: z.nativeEnum(ObjectiveStatus),
  progress: z.number(),
  data: z.record(z.unknown()),
});
export type ObjectiveEventRecord = z.infer<typeof objectiveEventSchema>;

export const modifierSchema = z.object({
  source: z.string(),
  priorityDelta: z.number().optional(),
  timeLimitFactor: z.number().positive().optional(),
  timePressureMinutes: z.number().optional(),
  addedActions: z.array(z.string()).optional(),
  appliedAt: z.number(),
  expiresAt: z.number().nullable().optional(),
});
export type ObjectiveModifier = z.infer<typeof modifierSchema>;

/**
 * Persisted objective dictionary. The first block of fields is the
 * contractual shape; `kind`, `options`, `state` and `modifiers` carry what the
 * registry needs to rebuild the variant.
 */
export const objectiveDictSchema = z.object({
  objective_id: z.string().min(1),
  uuid: z.string(),
  title: z.string(),
  description: z.string(),
  objective_type: z.nativeEnum(ObjectiveType),
  scope: z.nativeEnum(ObjectiveScope),
  priority: z.number().int().min(1).max(6),
  status: z.nativeEnum(ObjectiveStatus),
  progress: z.number().min(0).max(1),
  created_at: z.string(),
  activated_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  time_limit: z.number().nullable(),
  parent_objective: z.string().nullable(),
  child_objectives: z.array(z.string()),
  metadata: z.record(z.unknown()),
  attempt_count: z.number().int().min(0),
  events: z.array(objectiveEventSchema),

  kind: z.string(),
  last_update: z.string().nullable(),
  options: objectiveOptionsSchema,
  state: z.record(z.unknown()),
  modifiers: z.array(modifierSchema),
});
export type ObjectiveDict = z.infer<typeof objectiveDictSchema>;

export const managerStatisticsSchema = z.object({
  objectivesCreated: z.number(),
  objectivesCompleted: z.number(),
  objectivesFailed: z.number(),
  objectivesExpired: z.number(),
  totalProgressUpdates: z.number(),
});
export type ManagerStatistics = z.infer<typeof managerStatisticsSchema>;

export const managerSaveSchema = z.object({
  objectives: z.record(objectiveDictSchema),
  active_objectives: z.array(z.string()),
  completed_objectives: z.array(z.string()),
  failed_objectives: z.array(z.string()),
  statistics: managerStatisticsSchema,
  last_update: z.string().nullable(),
  update_count: z.number().int().min(0),
});
export type ManagerSave = z.infer<typeof managerSaveSchema>;
