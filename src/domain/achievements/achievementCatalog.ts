import {
  AchievementCategory,
  AchievementCondition,
  AchievementRarity,
  AchievementTrigger,
  ComparisonOperator,
} from "@/shared/constants/AchievementEnums";
import { ObjectiveType } from "@/shared/constants/ObjectiveEnums";
import { SanityState } from "@/shared/constants/SanityEnums";
import type { AchievementDefinition } from "./schemas";

/**
 * Achievements every new manager starts with.
 */
export const DEFAULT_ACHIEVEMENTS: readonly AchievementDefinition[] = [
  {
    achievementId: "first_survival",
    title: "The Living",
    description: "Survive your first supernatural encounter",
    category: AchievementCategory.SURVIVAL,
    rarity: AchievementRarity.COMMON,
    criteria: [
      {
        trigger: AchievementTrigger.EVENT_OCCURRENCE,
        target: true,
        operator: ComparisonOperator.OCCURRED,
        eventType: "supernatural_encounter_survived",
      },
    ],
    rewards: { title: "Survivor's Instinct", description: "You've learned to recognize danger" },
    flavorText: "The first brush with the impossible leaves its mark.",
  },
  {
    achievementId: "sanity_keeper",
    title: "Keeper of Reason",
    description: "Maintain sanity above 70 for an entire session",
    category: AchievementCategory.SANITY,
    rarity: AchievementRarity.UNCOMMON,
    criteria: [
      {
        trigger: AchievementTrigger.STAT_THRESHOLD,
        target: 70,
        operator: ComparisonOperator.GTE,
        statName: "sessionMinSanity",
      },
    ],
    rewards: {
      title: "Mental Fortitude",
      description: "Resistance to madness",
      statisticalBonus: { sanityResistance: 0.1 },
    },
    flavorText: "A clear mind in a world gone mad.",
  },
  {
    achievementId: "first_truth",
    title: "Glimpse of Truth",
    description: "Gain your first piece of cosmic knowledge",
    category: AchievementCategory.KNOWLEDGE,
    rarity: AchievementRarity.COMMON,
    criteria: [
      {
        trigger: AchievementTrigger.STAT_THRESHOLD,
        target: 1,
        operator: ComparisonOperator.GTE,
        statName: "cosmicKnowledgeCount",
      },
    ],
    rewards: {
      title: "Awakened Mind",
      description: "Understanding begins",
      loreEntries: ["cosmic_awareness_intro"],
    },
    flavorText: "The first step into a larger, more terrible universe.",
  },
  {
    achievementId: "forbidden_scholar",
    title: "Scholar of the Forbidden",
    description: "Acquire knowledge of 5 different mythos entities",
    category: AchievementCategory.KNOWLEDGE,
    rarity: AchievementRarity.RARE,
    criteria: [
      {
        trigger: AchievementTrigger.STAT_THRESHOLD,
        target: 5,
        operator: ComparisonOperator.GTE,
        statName: "knownEntitiesCount",
      },
    ],
    rewards: {
      title: "Deep Understanding",
      description: "Profound cosmic insights",
      unlockContent: ["advanced_lore"],
      statisticalBonus: { investigationBonus: 0.15 },
    },
    prerequisites: ["first_truth"],
    cosmicSignificance: "Understanding several entities changes one's worldview for good",
    flavorText: "To know them is to invite their attention.",
  },
  {
    achievementId: "first_mystery",
    title: "First Case",
    description: "Complete your first investigation objective",
    category: AchievementCategory.INVESTIGATION,
    rarity: AchievementRarity.COMMON,
    criteria: [
      {
        trigger: AchievementTrigger.OBJECTIVE_COMPLETION,
        target: 1,
        operator: ComparisonOperator.TYPE_COUNT,
        objectiveType: ObjectiveType.INVESTIGATION,
      },
    ],
    rewards: { title: "Detective's Eye", description: "Enhanced observation skills" },
    flavorText: "Every great investigator starts with a single case.",
  },
  {
    achievementId: "master_detective",
    title: "Master Detective",
    description: "Complete 25 investigation objectives",
    category: AchievementCategory.INVESTIGATION,
    rarity: AchievementRarity.EPIC,
    criteria: [
      {
        trigger: AchievementTrigger.OBJECTIVE_COMPLETION,
        target: 25,
        operator: ComparisonOperator.TYPE_COUNT,
        objectiveType: ObjectiveType.INVESTIGATION,
      },
    ],
    rewards: {
      title: "Investigative Mastery",
      description: "Superior deductive abilities",
      statisticalBonus: { investigationSuccessRate: 0.2 },
    },
    prerequisites: ["first_mystery"],
    flavorText: "The threads of mystery bend to your will.",
  },
  {
    achievementId: "madness_embrace",
    title: "Embrace of Madness",
    description: "Continue playing while completely mad",
    category: AchievementCategory.SANITY,
    rarity: AchievementRarity.RARE,
    criteria: [
      {
        trigger: AchievementTrigger.CONDITION_MET,
        target: SanityState.MAD,
        condition: AchievementCondition.SANITY_STATE,
      },
    ],
    rewards: {
      title: "Mad Insight",
      description: "Wisdom through madness",
      unlockContent: ["madness_mechanics"],
      statisticalBonus: { madActionSuccess: 0.3 },
    },
    cosmicSignificance: "Madness can be a doorway to impossible truths",
    flavorText: "In madness, sometimes clarity is found.",
  },
  {
    achievementId: "cosmic_witness",
    title: "Witness to the Cosmos",
    description: "Encounter 3 different cosmic entities",
    category: AchievementCategory.KNOWLEDGE,
    rarity: AchievementRarity.LEGENDARY,
    criteria: [
      {
        trigger: AchievementTrigger.STAT_THRESHOLD,
        target: 3,
        operator: ComparisonOperator.GTE,
        statName: "cosmicEncounters",
      },
    ],
    rewards: {
      title: "Cosmic Awareness",
      description: "Understanding of the infinite",
      unlockContent: ["cosmic_entities_compendium"],
      statisticalBonus: { cosmicResistance: 0.25 },
    },
    cosmicSignificance: "To witness them is to learn humanity's place in the universe",
    flavorText: "You have looked upon the face of eternity.",
  },
  {
    achievementId: "dedicated_investigator",
    title: "Dedicated Investigator",
    description: "Play for a total of 50 hours",
    category: AchievementCategory.MASTERY,
    rarity: AchievementRarity.UNCOMMON,
    criteria: [
      {
        trigger: AchievementTrigger.STAT_THRESHOLD,
        target: 50,
        operator: ComparisonOperator.GTE,
        statName: "totalPlaytimeHours",
      },
    ],
    rewards: {
      title: "Veteran Status",
      description: "Recognition of dedication",
      cosmeticUnlocks: ["veteran_title", "experience_badge"],
    },
    flavorText: "Dedication to the truth requires time and sacrifice.",
  },
  {
    achievementId: "ultimate_survivor",
    title: "Ultimate Survivor",
    description: "Complete 10 different campaigns",
    category: AchievementCategory.MASTERY,
    rarity: AchievementRarity.LEGENDARY,
    criteria: [
      {
        trigger: AchievementTrigger.STAT_THRESHOLD,
        target: 10,
        operator: ComparisonOperator.GTE,
        statName: "completedCampaigns",
      },
    ],
    rewards: {
      title: "Master Survivor",
      description: "Legendary status among investigators",
      unlockContent: ["master_difficulty", "legendary_scenarios"],
      statisticalBonus: { allSkills: 0.1 },
    },
    cosmicSignificance: "Surviving so many encounters with the unknown marks you",
    flavorText: "You have walked through hell and emerged scarred but whole.",
  },
  {
    achievementId: "fourth_wall",
    title: "Beyond the Fourth Wall",
    description: "Discover the true nature of your reality",
    category: AchievementCategory.STORY,
    rarity: AchievementRarity.MYTHOS,
    criteria: [
      {
        trigger: AchievementTrigger.EVENT_OCCURRENCE,
        target: true,
        operator: ComparisonOperator.OCCURRED,
        eventType: "meta_realization",
      },
    ],
    rewards: {
      title: "True Sight",
      description: "See beyond the veil of reality",
      unlockContent: ["meta_content", "reality_mechanics"],
    },
    hidden: true,
    cosmicSignificance: "Some truths run deeper than cosmic horror",
    flavorText: "The greatest horror is learning you are a character in someone else's story.",
  },
];
