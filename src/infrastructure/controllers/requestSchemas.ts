import { z } from "zod";

import { objectiveOptionsSchema } from "@/domain/objectives/schemas";

/**
 * Request bodies accepted by the HTTP controllers. Snapshots keep unknown
 * keys: the game loop owns their shape and objectives read what they know.
 *
 * @module infrastructure/controllers/requestSchemas
 */

export const gameStateSchema = z
  .object({
    sanity: z.number().optional(),
    maxSanity: z.number().optional(),
    temporaryInsanity: z.boolean().optional(),
    cosmicInsight: z.number().optional(),
    activeMadness: z.array(z.string()).optional(),
    madnessSeverity: z.number().optional(),
    madnessProtection: z.boolean().optional(),
    cosmicKnowledge: z.array(z.string()).optional(),
    specialAbilities: z.array(z.string()).optional(),
    inventory: z.array(z.string()).optional(),
    currentLocation: z.string().optional(),
    campaignId: z.string().optional(),
    characterId: z.string().optional(),
    tensionLevel: z.number().optional(),
    storyPhase: z.string().optional(),
    npcsPresent: z.array(z.string()).optional(),
    threatLevel: z.number().optional(),
  })
  .passthrough();

export const actionDataSchema = z
  .object({
    actionType: z.string().optional(),
    discovery: z.string().optional(),
    milestoneCompleted: z.boolean().optional(),
    investigationBranch: z.string().optional(),
    advancement: z.number().optional(),
    storyBeatCompleted: z.boolean().optional(),
    skillUsed: z.string().optional(),
    sanLoss: z.number().min(0).optional(),
    revelation: z.string().optional(),
    phaseAdvancement: z.number().optional(),
    phaseIndex: z.number().int().optional(),
    mythosKnowledge: z
      .object({ entity: z.string(), levelGain: z.number().optional() })
      .optional(),
    themeEncounter: z.string().optional(),
    npcRelationship: z.object({ npc: z.string(), change: z.number() }).optional(),
    sessionDuration: z.number().min(0).optional(),
    masteryAdvancement: z
      .object({
        category: z.string(),
        skill: z.string(),
        advancement: z.number().optional(),
      })
      .optional(),
    patternLearned: z.string().optional(),
    survivalStrategy: z.string().optional(),
    strategySuccess: z.boolean().optional(),
    cosmicRevelation: z.string().optional(),
    insightValue: z.number().optional(),
  })
  .passthrough();

export const turnBodySchema = z.object({
  gameState: gameStateSchema.default({}),
  actionData: actionDataSchema.optional(),
});

export const createObjectiveBodySchema = z
  .object({
    id: z.string().min(1),
    kind: z.string().min(1).optional(),
    template: z.string().min(1).optional(),
    options: objectiveOptionsSchema.default({}),
  })
  .refine((body) => (body.kind === undefined) !== (body.template === undefined), {
    message: "Exactly one of kind or template is required",
  });

export const transitionBodySchema = z.object({
  gameState: gameStateSchema.default({}),
  reason: z.string().optional(),
});

export const suggestionsBodySchema = z.object({
  gameState: gameStateSchema.default({}),
  limit: z.number().int().min(0).optional(),
  implement: z.boolean().default(false),
});

export const achievementCheckBodySchema = z.object({
  gameData: z
    .object({
      completedObjectives: z
        .array(z.object({ id: z.string().optional(), type: z.string().optional() }))
        .optional(),
      events: z.array(z.object({ type: z.string() }).passthrough()).optional(),
      completedSequences: z.array(z.string()).optional(),
      unlockedAchievements: z.array(z.string()).optional(),
    })
    .passthrough()
    .default({}),
  playerStats: z.record(z.unknown()).default({}),
});
