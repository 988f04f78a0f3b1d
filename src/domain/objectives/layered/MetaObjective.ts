import {
  ObjectiveKind,
  ObjectiveScope,
} from "@/shared/constants/ObjectiveEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  isRecord,
  readNumber,
  readNumberRecord,
  readStringList,
} from "@/shared/utils/snapshotUtils";
import type { ActionData, GameStateSnapshot } from "@/domain/types/game-types";
import { Objective, type ObjectiveSeed } from "../core/Objective";
import type { UnlockCriteria } from "../schemas";

const DEFAULT_MASTERY_ADVANCEMENT = 0.1;
const PLAYTIME_HOURS_CAP = 100;

/**
 * Cross-campaign objective tracking the player rather than a character.
 *
 * Progress is the share of unlock criteria met. Without criteria it falls back
 * to a blend of campaigns, characters, patterns and playtime.
 */
export class MetaObjective extends Objective {
  readonly kind: string = ObjectiveKind.META;

  protected readonly campaignsParticipated: Set<string>;
  protected readonly charactersUsed: Set<string>;
  protected totalPlaytimeHours: number;
  protected masteryCategories: Record<string, Record<string, number>>;
  protected readonly learnedPatterns: Set<string>;
  protected survivalStrategies: Record<string, number>;
  protected readonly unlockCriteria: Record<string, UnlockCriteria>;
  protected readonly unlockedContent: Set<string>;

  constructor(objectiveId: string, seed: ObjectiveSeed = {}) {
    super(
      objectiveId,
      { ...seed, scope: ObjectiveScope.META },
      { scope: ObjectiveScope.META, timeLimitMinutes: null },
    );
    this.campaignsParticipated = new Set(seed.campaignsParticipated ?? []);
    this.charactersUsed = new Set(seed.charactersUsed ?? []);
    this.totalPlaytimeHours = seed.totalPlaytimeHours ?? 0;
    this.masteryCategories = structuredClone(seed.masteryCategories ?? {});
    this.learnedPatterns = new Set(seed.learnedPatterns ?? []);
    this.survivalStrategies = { ...(seed.survivalStrategies ?? {}) };
    this.unlockCriteria = structuredClone(seed.unlockCriteria ?? {});
    this.unlockedContent = new Set(seed.unlockedContent ?? []);
  }

  updateProgress(state: GameStateSnapshot, action?: ActionData): boolean {
    if (!this.isActive) return false;

    let progressMade = false;

    if (typeof state.campaignId === "string" && !this.campaignsParticipated.has(state.campaignId)) {
      this.campaignsParticipated.add(state.campaignId);
      progressMade = true;
    }
    if (typeof state.characterId === "string" && !this.charactersUsed.has(state.characterId)) {
      this.charactersUsed.add(state.characterId);
      progressMade = true;
    }

    if (action?.sessionDuration !== undefined && action.sessionDuration > 0) {
      this.totalPlaytimeHours += action.sessionDuration;
      progressMade = true;
    }

    const mastery = action?.masteryAdvancement;
    if (mastery !== undefined) {
      const category = (this.masteryCategories[mastery.category] ??= {});
      category[mastery.skill] =
        (category[mastery.skill] ?? 0) + (mastery.advancement ?? DEFAULT_MASTERY_ADVANCEMENT);
      progressMade = true;
    }

    const pattern = action?.patternLearned;
    if (pattern !== undefined && !this.learnedPatterns.has(pattern)) {
      this.learnedPatterns.add(pattern);
      progressMade = true;
      this.logEvent("pattern_learned", { pattern });
    }

    const strategy = action?.survivalStrategy;
    if (strategy !== undefined && (action?.strategySuccess ?? true)) {
      this.survivalStrategies[strategy] = (this.survivalStrategies[strategy] ?? 0) + 1;
      progressMade = true;
    }

    this.checkUnlockCriteria();
    this.recalculate();
    return progressMade;
  }

  /**
   * Re-evaluates every criterion on each update; newly met ones unlock content.
   */
  private checkUnlockCriteria(): void {
    for (const [name, criteria] of Object.entries(this.unlockCriteria)) {
      if (this.unlockedContent.has(name)) continue;
      if (!this.criteriaMet(criteria)) continue;

      this.unlockedContent.add(name);
      this.logEvent("content_unlocked", { content: name, criteria });
      logger.info(`Meta content unlocked: ${name}`, LogCategory.OBJECTIVES);
    }
  }

  private criteriaMet(criteria: UnlockCriteria): boolean {
    if (criteria.minCampaigns !== undefined && this.campaignsParticipated.size < criteria.minCampaigns) {
      return false;
    }
    if (criteria.minCharacters !== undefined && this.charactersUsed.size < criteria.minCharacters) {
      return false;
    }
    if (criteria.minPlaytime !== undefined && this.totalPlaytimeHours < criteria.minPlaytime) {
      return false;
    }
    if (
      criteria.requiredPatterns !== undefined &&
      !criteria.requiredPatterns.every((p) => this.learnedPatterns.has(p))
    ) {
      return false;
    }
    const mastery = criteria.masteryLevel;
    if (mastery !== undefined) {
      const level = this.masteryCategories[mastery.category]?.[mastery.skill] ?? 0;
      if (level < mastery.level) return false;
    }
    return true;
  }

  private recalculate(): void {
    const names = Object.keys(this.unlockCriteria);
    if (names.length > 0) {
      const unlocked = names.filter((n) => this.unlockedContent.has(n)).length;
      this.setProgress(unlocked / names.length);
      return;
    }

    this.setProgress(
      Math.min(
        1,
        this.campaignsParticipated.size * 0.3 +
          this.charactersUsed.size * 0.2 +
          this.learnedPatterns.size * 0.1 +
          Math.min(this.totalPlaytimeHours / PLAYTIME_HOURS_CAP, 1) * 0.4,
      ),
    );
  }

  isUnlocked(content: string): boolean {
    return this.unlockedContent.has(content);
  }

  getPlaytimeHours(): number {
    return this.totalPlaytimeHours;
  }

  getMasteryLevel(category: string, skill: string): number {
    return this.masteryCategories[category]?.[skill] ?? 0;
  }

  protected describeDetails(): Record<string, unknown> {
    return {
      experienceStats: {
        campaigns: this.campaignsParticipated.size,
        characters: this.charactersUsed.size,
        playtimeHours: this.totalPlaytimeHours,
      },
      mastery: structuredClone(this.masteryCategories),
      learnedPatterns: [...this.learnedPatterns],
      survivalStrategies: { ...this.survivalStrategies },
      unlockedContent: [...this.unlockedContent],
      pendingUnlocks: Object.keys(this.unlockCriteria).filter(
        (n) => !this.unlockedContent.has(n),
      ),
    };
  }

  protected getState(): Record<string, unknown> {
    return {
      campaignsParticipated: [...this.campaignsParticipated],
      charactersUsed: [...this.charactersUsed],
      totalPlaytimeHours: this.totalPlaytimeHours,
      masteryCategories: structuredClone(this.masteryCategories),
      learnedPatterns: [...this.learnedPatterns],
      survivalStrategies: { ...this.survivalStrategies },
      unlockedContent: [...this.unlockedContent],
    };
  }

  protected restoreState(state: Record<string, unknown>): void {
    for (const c of readStringList(state.campaignsParticipated)) this.campaignsParticipated.add(c);
    for (const c of readStringList(state.charactersUsed)) this.charactersUsed.add(c);
    for (const p of readStringList(state.learnedPatterns)) this.learnedPatterns.add(p);
    for (const u of readStringList(state.unlockedContent)) this.unlockedContent.add(u);
    this.totalPlaytimeHours = readNumber(state.totalPlaytimeHours, this.totalPlaytimeHours);
    this.survivalStrategies = {
      ...this.survivalStrategies,
      ...readNumberRecord(state.survivalStrategies),
    };
    if (isRecord(state.masteryCategories)) {
      for (const [category, skills] of Object.entries(state.masteryCategories)) {
        this.masteryCategories[category] = readNumberRecord(skills);
      }
    }
  }
}
