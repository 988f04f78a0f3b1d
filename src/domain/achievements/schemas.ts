import { z } from "zod";

import {
  AchievementCategory,
  AchievementCondition,
  AchievementRarity,
  AchievementTrigger,
  ComparisonOperator,
} from "@/shared/constants/AchievementEnums";
import { ObjectiveType } from "@/shared/constants/ObjectiveEnums";

/**
 * Schemas for achievement definitions and the achievement save document.
 *
 * @module domain/achievements/schemas
 */

export const achievementCriterionSchema = z.object({
  trigger: z.nativeEnum(AchievementTrigger),
  target: z.union([z.number(), z.string(), z.boolean(), z.array(z.string())]),
  operator: z.nativeEnum(ComparisonOperator).default(ComparisonOperator.EQ),
  /** STAT_THRESHOLD: the player stat compared */
  statName: z.string().optional(),
  /** OBJECTIVE_COMPLETION with TYPE_COUNT */
  objectiveType: z.nativeEnum(ObjectiveType).optional(),
  /** EVENT_OCCURRENCE: the event type matched */
  eventType: z.string().optional(),
  condition: z.nativeEnum(AchievementCondition).optional(),
  sequenceName: z.string().optional(),
});
export type AchievementCriterion = z.infer<typeof achievementCriterionSchema>;
export type AchievementCriterionInput = z.input<typeof achievementCriterionSchema>;

export const achievementRewardSchema = z.object({
  title: z.string(),
  description: z.string(),
  unlockContent: z.array(z.string()).default([]),
  statisticalBonus: z.record(z.number()).default({}),
  cosmeticUnlocks: z.array(z.string()).default([]),
  loreEntries: z.array(z.string()).default([]),
});
export type AchievementReward = z.infer<typeof achievementRewardSchema>;
export type AchievementRewardInput = z.input<typeof achievementRewardSchema>;

export const achievementDefinitionSchema = z.object({
  achievementId: z.string().min(1),
  title: z.string(),
  description: z.string(),
  category: z.nativeEnum(AchievementCategory),
  rarity: z.nativeEnum(AchievementRarity),
  criteria: z.array(achievementCriterionSchema),
  rewards: achievementRewardSchema.optional(),
  hidden: z.boolean().default(false),
  prerequisites: z.array(z.string()).default([]),
  cosmicSignificance: z.string().optional(),
  flavorText: z.string().optional(),
});
export type AchievementDefinition = z.input<typeof achievementDefinitionSchema>;

export const unlockRecordSchema = z.object({
  achievement_id: z.string(),
  title: z.string(),
  timestamp: z.string(),
  rarity: z.number().int(),
  category: z.string(),
});
export type UnlockRecord = z.infer<typeof unlockRecordSchema>;

export const achievementDictSchema = z.object({
  achievement_id: z.string(),
  title: z.string(),
  description: z.string(),
  category: z.nativeEnum(AchievementCategory),
  rarity: z.number().int().min(1).max(6),
  unlocked: z.boolean(),
  unlock_timestamp: z.string().nullable(),
  hidden: z.boolean(),
  cosmic_significance: z.string().nullable(),
  flavor_text: z.string().nullable(),
});
export type AchievementDict = z.infer<typeof achievementDictSchema>;

export const achievementSaveSchema = z.object({
  unlocked_achievements: z.array(z.string()),
  unlock_history: z.array(unlockRecordSchema),
  achievement_data: z.record(achievementDictSchema),
  save_timestamp: z.string(),
});
export type AchievementSave = z.infer<typeof achievementSaveSchema>;
