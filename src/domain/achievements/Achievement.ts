import {
  AchievementCondition,
  AchievementTrigger,
  ComparisonOperator,
  type AchievementCategory,
  type AchievementRarity,
} from "@/shared/constants/AchievementEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  readNumber,
  readStringList,
  toIsoOrNull,
} from "@/shared/utils/snapshotUtils";
import { deriveSanityState } from "../objectives/sanity/sanityState";
import {
  achievementDefinitionSchema,
  type AchievementCriterion,
  type AchievementDefinition,
  type AchievementDict,
  type AchievementReward,
} from "./schemas";

/**
 * Game-side facts an achievement is checked against. Read only.
 */
export interface AchievementGameData {
  completedObjectives?: Array<{ id?: string; type?: string }>;
  events?: Array<{ type: string }>;
  completedSequences?: string[];
  unlockedAchievements?: string[];
  [key: string]: unknown;
}

/**
 * Player statistics keyed by stat name. Read only.
 */
export type PlayerStats = Record<string, unknown>;

export interface CriterionInfo {
  type: AchievementTrigger;
  description: string;
  target: AchievementCriterion["target"];
}

export interface AchievementProgress {
  unlocked: boolean;
  unlockTimestamp: string | null;
  progress: number;
  metCriteria: number;
  totalCriteria: number;
  nextCriterion: CriterionInfo | null;
}

const DEFAULT_REWARD: AchievementReward = {
  title: "Recognition",
  description: "Achievement unlocked",
  unlockContent: [],
  statisticalBonus: {},
  cosmeticUnlocks: [],
  loreEntries: [],
};

function compareValues(
  current: unknown,
  target: AchievementCriterion["target"],
  operator: ComparisonOperator,
): boolean {
  switch (operator) {
    case ComparisonOperator.EQ:
      return current === target;
    case ComparisonOperator.GT:
      return typeof current === "number" && typeof target === "number" && current > target;
    case ComparisonOperator.GTE:
      return typeof current === "number" && typeof target === "number" && current >= target;
    case ComparisonOperator.LT:
      return typeof current === "number" && typeof target === "number" && current < target;
    case ComparisonOperator.LTE:
      return typeof current === "number" && typeof target === "number" && current <= target;
    case ComparisonOperator.IN:
      if (Array.isArray(target)) return typeof current === "string" && target.includes(current);
      return typeof target === "string" && typeof current === "string" && target.includes(current);
    case ComparisonOperator.CONTAINS:
      if (Array.isArray(current)) return current.includes(target);
      return typeof current === "string" && typeof target === "string" && current.includes(target);
    default:
      return false;
  }
}

/**
 * A milestone unlocked once every criterion holds and every prerequisite is
 * already unlocked. Criteria are checked independently and combined with AND.
 * Only `unlock` changes an achievement, and only the first time.
 */
export class Achievement {
  readonly achievementId: string;
  readonly title: string;
  readonly description: string;
  readonly category: AchievementCategory;
  readonly rarity: AchievementRarity;
  readonly criteria: readonly AchievementCriterion[];
  readonly rewards: AchievementReward;
  readonly hidden: boolean;
  readonly prerequisites: readonly string[];
  readonly cosmicSignificance: string | null;
  readonly flavorText: string | null;

  unlocked = false;
  unlockTimestamp: number | null = null;
  unlockContext: Record<string, unknown> = {};

  constructor(definition: AchievementDefinition) {
    const parsed = achievementDefinitionSchema.parse(definition);
    this.achievementId = parsed.achievementId;
    this.title = parsed.title;
    this.description = parsed.description;
    this.category = parsed.category;
    this.rarity = parsed.rarity;
    this.criteria = parsed.criteria;
    this.rewards = parsed.rewards ?? { ...DEFAULT_REWARD };
    this.hidden = parsed.hidden;
    this.prerequisites = parsed.prerequisites;
    this.cosmicSignificance = parsed.cosmicSignificance ?? null;
    this.flavorText = parsed.flavorText ?? null;
  }

  /**
   * @param unlockedIds - ids already unlocked; defaults to the ones listed in
   * the game data
   */
  checkUnlockConditions(
    gameData: AchievementGameData,
    playerStats: PlayerStats,
    unlockedIds: ReadonlySet<string> = new Set(readStringList(gameData.unlockedAchievements)),
  ): boolean {
    if (this.unlocked) return false;
    if (!this.prerequisites.every((id) => unlockedIds.has(id))) return false;
    return this.criteria.every((c) => this.checkCriterion(c, gameData, playerStats));
  }

  private checkCriterion(
    criterion: AchievementCriterion,
    gameData: AchievementGameData,
    playerStats: PlayerStats,
  ): boolean {
    switch (criterion.trigger) {
      case AchievementTrigger.STAT_THRESHOLD:
        return this.checkStatThreshold(criterion, playerStats);
      case AchievementTrigger.OBJECTIVE_COMPLETION:
        return this.checkObjectiveCompletion(criterion, gameData);
      case AchievementTrigger.EVENT_OCCURRENCE:
        return this.checkEventOccurrence(criterion, gameData);
      case AchievementTrigger.CONDITION_MET:
        return this.checkCondition(criterion, playerStats);
      case AchievementTrigger.SEQUENCE_COMPLETION:
        return (
          criterion.sequenceName !== undefined &&
          readStringList(gameData.completedSequences).includes(criterion.sequenceName)
        );
      default:
        return false;
    }
  }

  private checkStatThreshold(criterion: AchievementCriterion, playerStats: PlayerStats): boolean {
    const statName = criterion.statName;
    if (statName === undefined || !(statName in playerStats)) return false;
    return compareValues(playerStats[statName], criterion.target, criterion.operator);
  }

  private checkObjectiveCompletion(
    criterion: AchievementCriterion,
    gameData: AchievementGameData,
  ): boolean {
    const completed = gameData.completedObjectives ?? [];
    const target = readNumber(criterion.target, Number.POSITIVE_INFINITY);
    if (criterion.operator === ComparisonOperator.COUNT) {
      return completed.length >= target;
    }
    if (criterion.operator === ComparisonOperator.TYPE_COUNT) {
      return completed.filter((o) => o.type === criterion.objectiveType).length >= target;
    }
    return false;
  }

  private checkEventOccurrence(
    criterion: AchievementCriterion,
    gameData: AchievementGameData,
  ): boolean {
    const matching = (gameData.events ?? []).filter((e) => e.type === criterion.eventType);
    if (criterion.operator === ComparisonOperator.OCCURRED) return matching.length > 0;
    if (criterion.operator === ComparisonOperator.COUNT) {
      return matching.length >= readNumber(criterion.target, Number.POSITIVE_INFINITY);
    }
    return false;
  }

  private checkCondition(criterion: AchievementCriterion, playerStats: PlayerStats): boolean {
    switch (criterion.condition) {
      case AchievementCondition.SANITY_STATE:
        return (
          deriveSanityState({
            sanity: readNumber(playerStats.sanity, 50),
            temporaryInsanity: playerStats.temporaryInsanity === true,
          }) === criterion.target
        );
      case AchievementCondition.COSMIC_EXPOSURE:
        return (
          readNumber(playerStats.cosmicExposure, 0) >=
          readNumber(criterion.target, Number.POSITIVE_INFINITY)
        );
      default:
        return false;
    }
  }

  /**
   * Idempotent. Returns false when already unlocked.
   */
  unlock(context: Record<string, unknown> = {}): boolean {
    if (this.unlocked) return false;

    this.unlocked = true;
    this.unlockTimestamp = Date.now();
    this.unlockContext = { ...context };
    logger.info(`Achievement unlocked: ${this.title}`, LogCategory.ACHIEVEMENTS);
    return true;
  }

  getProgressInfo(gameData: AchievementGameData, playerStats: PlayerStats): AchievementProgress {
    const totalCriteria = this.criteria.length;
    if (this.unlocked) {
      return {
        unlocked: true,
        unlockTimestamp: toIsoOrNull(this.unlockTimestamp),
        progress: 1,
        metCriteria: totalCriteria,
        totalCriteria,
        nextCriterion: null,
      };
    }

    const unmet = this.criteria.filter((c) => !this.checkCriterion(c, gameData, playerStats));
    const metCriteria = totalCriteria - unmet.length;
    const next = unmet[0];
    return {
      unlocked: false,
      unlockTimestamp: null,
      progress: totalCriteria > 0 ? metCriteria / totalCriteria : 0,
      metCriteria,
      totalCriteria,
      nextCriterion:
        next === undefined
          ? null
          : { type: next.trigger, description: describeCriterion(next), target: next.target },
    };
  }

  toDict(): AchievementDict {
    return {
      achievement_id: this.achievementId,
      title: this.title,
      description: this.description,
      category: this.category,
      rarity: this.rarity,
      unlocked: this.unlocked,
      unlock_timestamp: toIsoOrNull(this.unlockTimestamp),
      hidden: this.hidden,
      cosmic_significance: this.cosmicSignificance,
      flavor_text: this.flavorText,
    };
  }
}

export function describeCriterion(criterion: AchievementCriterion): string {
  switch (criterion.trigger) {
    case AchievementTrigger.STAT_THRESHOLD:
      return `Reach ${String(criterion.target)} ${criterion.statName ?? "unknown"}`;
    case AchievementTrigger.OBJECTIVE_COMPLETION:
      return criterion.operator === ComparisonOperator.TYPE_COUNT && criterion.objectiveType
        ? `Complete ${String(criterion.target)} ${criterion.objectiveType} objectives`
        : `Complete ${String(criterion.target)} objectives`;
    case AchievementTrigger.EVENT_OCCURRENCE:
      return `Experience ${criterion.eventType ?? "event"}`;
    case AchievementTrigger.SEQUENCE_COMPLETION:
      return `Complete the ${criterion.sequenceName ?? "unknown"} sequence`;
    default:
      return "Meet special condition";
  }
}

