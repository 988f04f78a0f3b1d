import {
  ObjectiveKind,
  ObjectiveScope,
  ObjectiveType,
} from "@/shared/constants/ObjectiveEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  readNumber,
  readStringList,
} from "@/shared/utils/snapshotUtils";
import type { ActionData, GameStateSnapshot } from "@/domain/types/game-types";
import type { ObjectiveSeed } from "../core/Objective";
import type { InsightLevel } from "../schemas";
import { SanityIntegratedObjective } from "./SanityIntegratedObjective";
import { DEFAULT_MAX_SANITY, readSanity } from "./sanityState";

const DEFAULT_INSIGHT_VALUE = 0.1;
const INSIGHT_LOSS_SCALE = 10;
const VULNERABLE_SANITY = 50;
const MAX_SANITY_FLOOR = 50;
const LOW_SANITY_CAP = 10;
const ROUNDING_EPSILON = 1e-9;

export const DEFAULT_REVELATION_THRESHOLDS: readonly number[] = [0.25, 0.5, 0.75, 1];

function floorLoss(value: number): number {
  return Math.floor(value + ROUNDING_EPSILON);
}

/**
 * Knowledge bought with sanity. Every revelation advances progress and costs
 * SAN in proportion to the insight gained; crossing a revelation threshold
 * unlocks that level's knowledge and abilities for good.
 */
export class CosmicInsightObjective extends SanityIntegratedObjective {
  readonly kind: string = ObjectiveKind.COSMIC_INSIGHT;

  protected readonly insightLevels: InsightLevel[];
  protected readonly revelationThresholds: number[];
  protected readonly sanityCostPerInsight: number;
  protected readonly insightProtectionThreshold: number;
  currentInsightLevel = 0;

  constructor(objectiveId: string, seed: ObjectiveSeed = {}) {
    super(objectiveId, seed, {
      scope: ObjectiveScope.MID_TERM,
      objectiveType: ObjectiveType.KNOWLEDGE,
      timeLimitMinutes: null,
    });
    this.insightLevels = (seed.insightLevels ?? []).map((l) => ({ ...l }));
    this.revelationThresholds = [...(seed.revelationThresholds ?? DEFAULT_REVELATION_THRESHOLDS)];
    this.sanityCostPerInsight = seed.sanityCostPerInsight ?? 3;
    this.insightProtectionThreshold = seed.insightProtectionThreshold ?? 30;
  }

  updateProgress(state: GameStateSnapshot, action?: ActionData): boolean {
    if (!this.isActive) return false;

    const revelation = action?.cosmicRevelation;
    if (revelation === undefined) return false;

    const gain = action?.insightValue ?? DEFAULT_INSIGHT_VALUE;
    this.setProgress(Math.min(1, this.progress + gain));
    this.applyInsightPenalty(state, revelation, gain);
    this.logEvent("cosmic_revelation", {
      revelation_type: revelation,
      insight_gain: gain,
      total_progress: this.progress,
    });

    this.checkInsightLevels(state);
    return true;
  }

  /**
   * SAN cost of an insight: scaled by how fragile the mind already is, and
   * never enough to take SAN to zero in a single revelation.
   */
  calculateInsightCost(sanity: number, gain: number): number {
    const base = floorLoss(gain * this.sanityCostPerInsight * INSIGHT_LOSS_SCALE);
    let multiplier = 1;
    if (sanity < this.insightProtectionThreshold) multiplier = 1.5;
    else if (sanity < VULNERABLE_SANITY) multiplier = 1.2;

    let loss = floorLoss(base * multiplier);
    if (sanity <= LOW_SANITY_CAP) loss = Math.min(loss, 1);
    if (sanity > 0 && loss >= sanity) loss = sanity - 1;
    return Math.max(0, loss);
  }

  private applyInsightPenalty(state: GameStateSnapshot, revelation: string, gain: number): void {
    const loss = this.calculateInsightCost(readSanity(state), gain);
    if (loss > 0) this.applySanLoss(state, loss, `Cosmic revelation: ${revelation}`);
  }

  /**
   * Fires every level whose threshold was crossed since the last check.
   */
  private checkInsightLevels(state: GameStateSnapshot): void {
    while (this.currentInsightLevel < this.revelationThresholds.length) {
      const index = this.currentInsightLevel;
      if (index >= this.insightLevels.length) return;
      if (this.progress < this.revelationThresholds[index]) return;

      this.currentInsightLevel = index + 1;
      this.triggerInsightLevel(index, state);
    }
  }

  private triggerInsightLevel(index: number, state: GameStateSnapshot): void {
    const level = this.insightLevels[index];

    if (level.cosmicKnowledgeUnlock !== undefined) {
      state.cosmicKnowledge = [
        ...readStringList(state.cosmicKnowledge),
        ...level.cosmicKnowledgeUnlock,
      ];
    }
    if (level.sanityThresholdChange !== undefined) {
      const maxSanity = readNumber(state.maxSanity, DEFAULT_MAX_SANITY);
      state.maxSanity = Math.max(MAX_SANITY_FLOOR, maxSanity + level.sanityThresholdChange);
    }
    if (level.specialAbilityUnlock !== undefined) {
      state.specialAbilities = [
        ...readStringList(state.specialAbilities),
        ...level.specialAbilityUnlock,
      ];
    }

    this.logEvent("insight_level_reached", {
      level: index + 1,
      effects: { ...level },
    });
    logger.info(`Cosmic insight level ${index + 1} reached: ${this.title}`, LogCategory.SANITY);
  }

  protected describeDetails(): Record<string, unknown> {
    return {
      ...super.describeDetails(),
      insightLevel: this.currentInsightLevel,
      totalLevels: this.insightLevels.length,
      nextThreshold: this.revelationThresholds[this.currentInsightLevel] ?? null,
      sanityCostPerInsight: this.sanityCostPerInsight,
    };
  }

  protected getState(): Record<string, unknown> {
    return { ...super.getState(), currentInsightLevel: this.currentInsightLevel };
  }

  protected restoreState(state: Record<string, unknown>): void {
    super.restoreState(state);
    this.currentInsightLevel = readNumber(state.currentInsightLevel, 0);
  }
}
