import fs from "fs/promises";
import path from "path";
import { inject, injectable, optional } from "inversify";

import { TYPES } from "@/config/Types";
import {
  AchievementCategory,
  AchievementRarity,
} from "@/shared/constants/AchievementEnums";
import { ObjectiveEventType } from "@/shared/constants/EventEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { errorMessage, readTimestamp } from "@/shared/utils/snapshotUtils";
import type { ObjectiveEventBus } from "../objectives/core/ObjectiveEventBus";
import {
  Achievement,
  type AchievementGameData,
  type AchievementProgress,
  type PlayerStats,
} from "./Achievement";
import { DEFAULT_ACHIEVEMENTS } from "./achievementCatalog";
import {
  achievementSaveSchema,
  type AchievementSave,
  type UnlockRecord,
} from "./schemas";

const RECENT_UNLOCKS = 5;

export interface BreakdownEntry {
  total: number;
  unlocked: number;
  unlockRate: number;
}

export interface AchievementProgressEntry extends AchievementProgress {
  achievementId: string;
  title: string;
  description: string;
  category: AchievementCategory;
  rarity: AchievementRarity;
}

function breakdown(achievements: Achievement[]): BreakdownEntry {
  const unlocked = achievements.filter((a) => a.unlocked).length;
  return {
    total: achievements.length,
    unlocked,
    unlockRate: achievements.length > 0 ? unlocked / achievements.length : 0,
  };
}

/**
 * Holds the achievement catalog and evaluates it against game snapshots.
 * Unlocks are announced on the objective event bus when one is bound.
 */
@injectable()
export class AchievementManager {
  private achievements = new Map<string, Achievement>();
  private unlockHistory: UnlockRecord[] = [];

  constructor(
    @inject(TYPES.ObjectiveEventBus)
    @optional()
    private readonly eventBus?: ObjectiveEventBus,
  ) {
    for (const definition of DEFAULT_ACHIEVEMENTS) {
      this.registerAchievement(new Achievement(definition));
    }
    logger.info("AchievementManager initialized", LogCategory.ACHIEVEMENTS, {
      total: this.achievements.size,
    });
  }

  /**
   * Adds or replaces an achievement by id.
   */
  registerAchievement(achievement: Achievement): void {
    this.achievements.set(achievement.achievementId, achievement);
    logger.debug(`Added achievement: ${achievement.title}`, LogCategory.ACHIEVEMENTS);
  }

  getAchievement(achievementId: string): Achievement | undefined {
    return this.achievements.get(achievementId);
  }

  getAllAchievements(includeHidden = true): Achievement[] {
    const all = [...this.achievements.values()];
    return includeHidden ? all : all.filter((a) => !a.hidden || a.unlocked);
  }

  getUnlocked(): Achievement[] {
    return [...this.achievements.values()].filter((a) => a.unlocked);
  }

  getLocked(includeHidden = false): Achievement[] {
    return [...this.achievements.values()].filter(
      (a) => !a.unlocked && (includeHidden || !a.hidden),
    );
  }

  getAchievementsByCategory(category: AchievementCategory, includeHidden = false): Achievement[] {
    return [...this.achievements.values()].filter(
      (a) => a.category === category && (includeHidden || !a.hidden),
    );
  }

  private unlockedIds(): Set<string> {
    return new Set(this.getUnlocked().map((a) => a.achievementId));
  }

  /**
   * Unlocks every achievement whose conditions hold and returns the newly
   * unlocked ones. Repeats until nothing changes, so an achievement whose
   * prerequisite unlocked in the same call is also considered.
   */
  checkAllAchievements(gameData: AchievementGameData, playerStats: PlayerStats): Achievement[] {
    const newlyUnlocked: Achievement[] = [];
    let changed = true;

    while (changed) {
      changed = false;
      const unlockedIds = this.unlockedIds();
      for (const achievement of this.achievements.values()) {
        if (!achievement.checkUnlockConditions(gameData, playerStats, unlockedIds)) continue;
        if (!achievement.unlock({ checkedAt: new Date().toISOString() })) continue;

        changed = true;
        newlyUnlocked.push(achievement);
        this.recordUnlock(achievement);
      }
    }
    return newlyUnlocked;
  }

  private recordUnlock(achievement: Achievement): void {
    const record: UnlockRecord = {
      achievement_id: achievement.achievementId,
      title: achievement.title,
      timestamp: new Date(achievement.unlockTimestamp ?? Date.now()).toISOString(),
      rarity: achievement.rarity,
      category: achievement.category,
    };
    this.unlockHistory.push(record);
    this.eventBus?.publish(ObjectiveEventType.ACHIEVEMENT_UNLOCKED, {
      achievementId: achievement.achievementId,
      title: achievement.title,
      rarity: achievement.rarity,
      category: achievement.category,
    });
  }

  getAchievementProgress(
    achievementId: string,
    gameData: AchievementGameData,
    playerStats: PlayerStats,
  ): AchievementProgress | null {
    return this.achievements.get(achievementId)?.getProgressInfo(gameData, playerStats) ?? null;
  }

  /**
   * Progress of every achievement. Hidden ones show up once unlocked.
   */
  getProgressReport(
    gameData: AchievementGameData,
    playerStats: PlayerStats,
  ): AchievementProgressEntry[] {
    return this.getAllAchievements(false).map((a) => ({
      achievementId: a.achievementId,
      title: a.title,
      description: a.description,
      category: a.category,
      rarity: a.rarity,
      ...a.getProgressInfo(gameData, playerStats),
    }));
  }

  getUnlockHistory(): readonly UnlockRecord[] {
    return this.unlockHistory;
  }

  getStatistics() {
    const all = [...this.achievements.values()];
    const unlocked = this.getUnlocked();

    const categoryBreakdown: Record<string, BreakdownEntry> = {};
    for (const category of Object.values(AchievementCategory)) {
      categoryBreakdown[category] = breakdown(this.getAchievementsByCategory(category));
    }

    const rarityBreakdown: Record<string, BreakdownEntry> = {};
    for (const rarity of Object.values(AchievementRarity)) {
      if (typeof rarity !== "number") continue;
      rarityBreakdown[String(rarity)] = breakdown(all.filter((a) => a.rarity === rarity));
    }

    const rarest = unlocked.reduce<Achievement | null>(
      (best, a) => (best === null || a.rarity > best.rarity ? a : best),
      null,
    );

    return {
      totalAchievements: all.length,
      unlockedCount: unlocked.length,
      overallUnlockRate: all.length > 0 ? unlocked.length / all.length : 0,
      categoryBreakdown,
      rarityBreakdown,
      recentUnlocks: this.unlockHistory.slice(-RECENT_UNLOCKS),
      latestUnlock: this.unlockHistory[this.unlockHistory.length - 1] ?? null,
      rarestUnlocked:
        rarest === null
          ? null
          : { achievementId: rarest.achievementId, title: rarest.title, rarity: rarest.rarity },
      completionPercentage: this.completionPercentage(all),
    };
  }

  /**
   * Share of the catalog unlocked, weighted by rarity.
   */
  private completionPercentage(all: Achievement[]): number {
    const totalWeight = all.reduce((sum, a) => sum + a.rarity, 0);
    if (totalWeight === 0) return 0;
    const unlockedWeight = all.filter((a) => a.unlocked).reduce((sum, a) => sum + a.rarity, 0);
    return (unlockedWeight / totalWeight) * 100;
  }

  /**
   * Relocks everything and forgets the unlock history.
   */
  reset(): void {
    for (const achievement of this.achievements.values()) {
      achievement.unlocked = false;
      achievement.unlockTimestamp = null;
      achievement.unlockContext = {};
    }
    this.unlockHistory = [];
  }

  // ==================== Persistence ====================

  toSaveData(): AchievementSave {
    const achievementData: AchievementSave["achievement_data"] = {};
    for (const achievement of this.getUnlocked()) {
      achievementData[achievement.achievementId] = achievement.toDict();
    }
    return {
      unlocked_achievements: [...this.unlockedIds()],
      unlock_history: this.unlockHistory.map((r) => ({ ...r })),
      achievement_data: achievementData,
      save_timestamp: new Date().toISOString(),
    };
  }

  async saveToFile(filePath: string): Promise<boolean> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(this.toSaveData(), null, 2), "utf-8");
      logger.info(`Achievement progress saved to ${filePath}`, LogCategory.STORAGE);
      return true;
    } catch (error) {
      logger.error(`Failed to save achievement progress: ${errorMessage(error)}`, LogCategory.STORAGE);
      return false;
    }
  }

  /**
   * Restores unlock state for the achievements this manager knows. Ids that
   * are not registered are ignored.
   */
  async loadFromFile(filePath: string): Promise<boolean> {
    let data: AchievementSave;
    try {
      const raw: unknown = JSON.parse(await fs.readFile(filePath, "utf-8"));
      const parsed = achievementSaveSchema.safeParse(raw);
      if (!parsed.success) {
        logger.error(
          `Invalid achievement save file ${filePath}: ${parsed.error.message}`,
          LogCategory.STORAGE,
        );
        return false;
      }
      data = parsed.data;
    } catch (error) {
      logger.error(`Failed to load achievement progress: ${errorMessage(error)}`, LogCategory.STORAGE);
      return false;
    }

    this.reset();
    for (const id of data.unlocked_achievements) {
      const achievement = this.achievements.get(id);
      if (!achievement) continue;
      achievement.unlocked = true;
      achievement.unlockTimestamp = readTimestamp(data.achievement_data[id]?.unlock_timestamp);
    }
    this.unlockHistory = data.unlock_history.map((r) => ({ ...r }));

    logger.info(`Achievement progress loaded from ${filePath}`, LogCategory.STORAGE);
    return true;
  }
}
