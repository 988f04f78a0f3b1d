/**
 * Ready-made objectives for common investigator situations.
 *
 * Every factory takes the objective id, the story-specific bits, and optional
 * overrides merged last.
 *
 * @module domain/objectives/factories
 */

import {
  ConsequenceType,
  ObjectivePriority,
  ObjectiveScope,
  ObjectiveType,
  RewardType,
} from "@/shared/constants/ObjectiveEnums";
import { MadnessType } from "@/shared/constants/SanityEnums";
import type { SanityState } from "@/shared/constants/SanityEnums";
import type { ObjectiveSeed } from "./core/Objective";
import { createLocationCondition } from "./core/ObjectiveCondition";
import { STANDARD_CONSEQUENCES, STANDARD_REWARDS } from "./core/rewards";
import { ImmediateObjective } from "./layered/ImmediateObjective";
import { LongTermObjective, GROWTH_GOALS } from "./layered/LongTermObjective";
import { MetaObjective } from "./layered/MetaObjective";
import { MidTermObjective } from "./layered/MidTermObjective";
import { ShortTermObjective } from "./layered/ShortTermObjective";
import { CosmicInsightObjective } from "./sanity/CosmicInsightObjective";
import { MadnessObjective } from "./sanity/MadnessObjective";
import { SanityDependentObjective } from "./sanity/SanityDependentObjective";
import type {
  CampaignPhase,
  InsightLevel,
  StateConfiguration,
  UnlockCriteria,
} from "./schemas";

const DEFAULT_CONVERSATION_GOALS = [
  "initiate_conversation",
  "ask_questions",
  "conclude_conversation",
];

export function createInvestigationObjective(
  objectiveId: string,
  title: string,
  location: string,
  requiredDiscoveries: string[] = [],
  timeLimitMinutes = 15,
  overrides: ObjectiveSeed = {},
): ShortTermObjective {
  return new ShortTermObjective(objectiveId, {
    title,
    description: `Thoroughly investigate ${location} to uncover its secrets`,
    objectiveType: ObjectiveType.INVESTIGATION,
    priority: ObjectivePriority.NORMAL,
    timeLimitMinutes,
    activationConditions: [createLocationCondition(location)],
    requiredDiscoveries,
    sceneContext: { location },
    rewards: [STANDARD_REWARDS.KNOWLEDGE],
    consequences: [STANDARD_CONSEQUENCES.SAN_LOSS_MINOR],
    ...overrides,
  });
}

export function createSurvivalObjective(
  objectiveId: string,
  title: string,
  threatDescription: string,
  durationMinutes = 10,
  overrides: ObjectiveSeed = {},
): ShortTermObjective {
  return new ShortTermObjective(objectiveId, {
    title,
    description: `Survive ${threatDescription}`,
    objectiveType: ObjectiveType.SURVIVAL,
    priority: ObjectivePriority.HIGH,
    timeLimitMinutes: durationMinutes,
    rewards: [STANDARD_REWARDS.SURVIVAL, STANDARD_REWARDS.SANITY_MINOR],
    consequences: [STANDARD_CONSEQUENCES.SAN_LOSS_MAJOR],
    tensionRampEnabled: true,
    initialTension: 2,
    maxTension: 5,
    ...overrides,
  });
}

export function createSocialObjective(
  objectiveId: string,
  title: string,
  npcName: string,
  conversationGoals: string[] = DEFAULT_CONVERSATION_GOALS,
  overrides: ObjectiveSeed = {},
): ImmediateObjective {
  return new ImmediateObjective(objectiveId, {
    title,
    description: `Engage with ${npcName} to gather information`,
    objectiveType: ObjectiveType.SOCIAL,
    priority: ObjectivePriority.NORMAL,
    requiredActions: conversationGoals,
    rewards: [STANDARD_REWARDS.KNOWLEDGE],
    metadata: { npcName, conversationGoals },
    ...overrides,
  });
}

export function createExplorationObjective(
  objectiveId: string,
  title: string,
  areas: string[],
  overrides: ObjectiveSeed = {},
): ShortTermObjective {
  return new ShortTermObjective(objectiveId, {
    title,
    description: `Explore and map out the following areas: ${areas.join(", ")}`,
    objectiveType: ObjectiveType.EXPLORATION,
    priority: ObjectivePriority.NORMAL,
    requiredDiscoveries: areas.map((area) => `explored_${area}`),
    milestoneCount: areas.length,
    rewards: [STANDARD_REWARDS.KNOWLEDGE],
    consequences: [STANDARD_CONSEQUENCES.SAN_LOSS_MINOR],
    ...overrides,
  });
}

export function createKnowledgeObjective(
  objectiveId: string,
  title: string,
  mythosEntity: string,
  knowledgeLevel = 1,
  overrides: ObjectiveSeed = {},
): MidTermObjective {
  return new MidTermObjective(objectiveId, {
    title,
    description: `Learn about ${mythosEntity} and its connection to current events`,
    objectiveType: ObjectiveType.KNOWLEDGE,
    priority: ObjectivePriority.NORMAL,
    horrorRevelations: [`${mythosEntity}_basic`, `${mythosEntity}_advanced`],
    rewards: [STANDARD_REWARDS.KNOWLEDGE],
    consequences: [STANDARD_CONSEQUENCES.SAN_LOSS_MAJOR, STANDARD_CONSEQUENCES.COSMIC_ATTENTION],
    metadata: { mythosEntity, targetKnowledgeLevel: knowledgeLevel },
    ...overrides,
  });
}

export function createProtectionObjective(
  objectiveId: string,
  title: string,
  protectedEntity: string,
  threatLevel = 3,
  overrides: ObjectiveSeed = {},
): MidTermObjective {
  return new MidTermObjective(objectiveId, {
    title,
    description: `Keep ${protectedEntity} safe from harm`,
    objectiveType: ObjectiveType.PROTECTION,
    priority: ObjectivePriority.HIGH,
    storyBeats: [
      { name: "identify_threat", description: "Identify the nature of the threat" },
      { name: "establish_protection", description: "Set up protective measures" },
      { name: "monitor_situation", description: "Watch for signs of danger" },
      { name: "respond_to_crisis", description: "Handle direct threats" },
    ],
    rewards: [
      STANDARD_REWARDS.SURVIVAL,
      { type: RewardType.ALLIANCE, value: 1, description: `Gain trust of ${protectedEntity}` },
    ],
    consequences: [
      {
        type: ConsequenceType.NPC_DEATH,
        severity: 5,
        description: `${protectedEntity} is harmed or killed`,
      },
      STANDARD_CONSEQUENCES.SAN_LOSS_MAJOR,
    ],
    metadata: { protectedEntity, threatLevel },
    ...overrides,
  });
}

export function createEscapeObjective(
  objectiveId: string,
  title: string,
  location: string,
  urgencyLevel = 3,
  overrides: ObjectiveSeed = {},
): ShortTermObjective {
  return new ShortTermObjective(objectiveId, {
    title,
    description: `Escape from ${location} before it's too late`,
    objectiveType: ObjectiveType.ESCAPE,
    priority: ObjectivePriority.CRITICAL,
    timeLimitMinutes: 10,
    requiredDiscoveries: ["exit_route", "clear_obstacles", "avoid_dangers"],
    tensionRampEnabled: true,
    initialTension: urgencyLevel,
    maxTension: 5,
    rewards: [STANDARD_REWARDS.SURVIVAL],
    consequences: [
      {
        type: ConsequenceType.HP_LOSS,
        severity: urgencyLevel,
        description: "Physical harm from failed escape",
      },
      {
        type: ConsequenceType.SAN_LOSS,
        severity: urgencyLevel,
        description: "Terror from being trapped",
      },
    ],
    metadata: { escapeLocation: location, urgencyLevel },
    ...overrides,
  });
}

export function createCampaignObjective(
  objectiveId: string,
  title: string,
  campaignName: string,
  phases: CampaignPhase[],
  themes: string[] = [],
  overrides: ObjectiveSeed = {},
): LongTermObjective {
  return new LongTermObjective(objectiveId, {
    title,
    description: `Complete the ${campaignName} campaign and uncover its mysteries`,
    objectiveType: ObjectiveType.REVELATION,
    priority: ObjectivePriority.HIGH,
    campaignPhases: phases,
    recurringThemes: themes,
    characterGrowthGoals: {
      [GROWTH_GOALS.MYTHOS_ENTITIES]: 5,
      [GROWTH_GOALS.MYTHOS_KNOWLEDGE_TOTAL]: 10,
      [GROWTH_GOALS.NPC_RELATIONSHIPS]: 3,
    },
    rewards: [
      { type: RewardType.COSMIC_INSIGHT, value: 1, description: "Gain deep understanding of cosmic truth" },
      { type: RewardType.KNOWLEDGE, value: 5, description: "Extensive mythos knowledge" },
    ],
    consequences: [STANDARD_CONSEQUENCES.COSMIC_ATTENTION],
    metadata: { campaignName },
    ...overrides,
  });
}

export function createMasteryObjective(
  objectiveId: string,
  title: string,
  masteryType: string,
  unlockCriteria: UnlockCriteria,
  overrides: ObjectiveSeed = {},
): MetaObjective {
  return new MetaObjective(objectiveId, {
    title,
    description: `Achieve mastery in ${masteryType} across multiple campaigns`,
    objectiveType: ObjectiveType.KNOWLEDGE,
    priority: ObjectivePriority.LOW,
    unlockCriteria: { [`${masteryType}_mastery`]: unlockCriteria },
    masteryCategories: { [masteryType]: {} },
    rewards: [
      {
        type: RewardType.COSMIC_INSIGHT,
        value: 1,
        description: `Master-level understanding of ${masteryType}`,
      },
    ],
    metadata: { masteryType },
    ...overrides,
  });
}

export function createForbiddenKnowledgeObjective(
  objectiveId: string,
  title: string,
  knowledgeType: string,
  insightLevels: InsightLevel[],
  overrides: ObjectiveSeed = {},
): CosmicInsightObjective {
  return new CosmicInsightObjective(objectiveId, {
    title,
    description: `Learn the terrible truth about ${knowledgeType}`,
    objectiveType: ObjectiveType.KNOWLEDGE,
    scope: ObjectiveScope.MID_TERM,
    priority: ObjectivePriority.HIGH,
    sanRiskLevel: 4,
    insightLevels,
    sanityCostPerInsight: 3,
    rewards: [
      {
        type: RewardType.COSMIC_INSIGHT,
        value: 1,
        description: `Deep understanding of ${knowledgeType}`,
      },
      { type: RewardType.KNOWLEDGE, value: 3, description: "Forbidden knowledge gained" },
    ],
    consequences: [
      {
        type: ConsequenceType.SAN_LOSS,
        severity: 5,
        description: "Failed to comprehend cosmic truth",
      },
      {
        type: ConsequenceType.COSMIC_ATTENTION,
        severity: 3,
        description: "Noticed by cosmic entities",
      },
    ],
    ...overrides,
  });
}

export function createSanityDependentInvestigation(
  objectiveId: string,
  title: string,
  location: string,
  stateConfigurations: Partial<Record<SanityState, StateConfiguration>>,
  overrides: ObjectiveSeed = {},
): SanityDependentObjective {
  return new SanityDependentObjective(objectiveId, {
    title,
    description: `Investigate ${location} - methods depend on mental state`,
    objectiveType: ObjectiveType.INVESTIGATION,
    scope: ObjectiveScope.SHORT_TERM,
    priority: ObjectivePriority.NORMAL,
    stateConfigurations,
    sanRiskLevel: 2,
    rewards: [{ type: RewardType.KNOWLEDGE, value: 1, description: "Information gathered" }],
    consequences: [
      { type: ConsequenceType.SAN_LOSS, severity: 2, description: "Disturbing findings" },
    ],
    ...overrides,
  });
}

export function createMadnessDrivenObjective(
  objectiveId: string,
  title: string,
  requiredMadness: MadnessType[] = [MadnessType.COMPULSION],
  overrides: ObjectiveSeed = {},
): MadnessObjective {
  return new MadnessObjective(objectiveId, {
    title,
    description: "An action that only makes sense to a disturbed mind",
    objectiveType: ObjectiveType.RITUAL,
    scope: ObjectiveScope.SHORT_TERM,
    priority: ObjectivePriority.HIGH,
    requiredMadnessTypes: requiredMadness,
    madnessProgressMultiplier: 2,
    sanityRecoveryOnCompletion: 3,
    rewards: [
      {
        type: RewardType.SANITY_RESTORATION,
        value: 3,
        description: "Confronting madness provides clarity",
      },
      { type: RewardType.REVELATION, value: 1, description: "Madness reveals hidden truth" },
    ],
    ...overrides,
  });
}
