import {
  ObjectiveScope,
  ObjectiveType,
} from "@/shared/constants/ObjectiveEnums";
import { SanityState } from "@/shared/constants/SanityEnums";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  clamp,
  isRecord,
  readNumber,
  readStringList,
} from "@/shared/utils/snapshotUtils";
import type { ActionData, GameStateSnapshot } from "@/domain/types/game-types";
import {
  Objective,
  type ObjectiveDefaults,
  type ObjectiveSeed,
} from "../core/Objective";
import type { MadnessEffect, SanityThresholds } from "../schemas";
import {
  DEFAULT_MAX_SANITY,
  DEFAULT_SANITY_THRESHOLDS,
  SANITY_RISK_MODIFIERS,
  deriveSanityState,
  madnessCanTrigger,
  readSanity,
} from "./sanityState";

const HOUR_MS = 3_600_000;
const MAX_SANITY_EVENTS = 50;
const MIN_RISK = 1;
const MAX_RISK = 10;
const PROTECTION_REDUCTION = 2;

export interface SanityEvent {
  timestamp: string;
  kind: "loss" | "gain";
  amount: number;
  reason: string;
  sanityBefore: number;
  sanityAfter: number;
  cumulativeLoss: number;
}

const SANITY_DEFAULTS: ObjectiveDefaults = {
  scope: ObjectiveScope.SHORT_TERM,
  objectiveType: ObjectiveType.INVESTIGATION,
  timeLimitMinutes: null,
};

/**
 * Base for objectives coupled to the character's SAN.
 *
 * Reads the mental state from every snapshot, prices the SAN risk of acting,
 * writes SAN losses and gains back into the snapshot with an audit trail, and
 * lets registered madness effects take hold once the mind slips far enough.
 * A madness effect never rewrites the objective: it pushes a modifier
 * (`madness:<type>`) that changes priority, time limit or required actions at
 * read time.
 */
export abstract class SanityIntegratedObjective extends Objective {
  protected readonly sanityThresholds: SanityThresholds;
  protected readonly requiredSanityState: SanityState | null;
  sanRiskLevel: number;
  protected readonly cosmicInsightRequired: number;
  protected readonly madnessEffects: MadnessEffect[];
  protected readonly madnessProtection: boolean;
  protected readonly potentialSanGain: number;

  protected cumulativeSanLoss = 0;
  protected sanityEvents: SanityEvent[] = [];
  /** Action types performed while active; compulsions are checked against it */
  protected performedActions = new Set<string>();

  protected constructor(
    objectiveId: string,
    seed: ObjectiveSeed,
    defaults: ObjectiveDefaults = SANITY_DEFAULTS,
  ) {
    super(objectiveId, seed, defaults);
    this.sanityThresholds = { ...(seed.sanityThresholds ?? DEFAULT_SANITY_THRESHOLDS) };
    this.requiredSanityState = seed.requiredSanityState ?? null;
    this.sanRiskLevel = seed.sanRiskLevel ?? 1;
    this.cosmicInsightRequired = seed.cosmicInsightRequired ?? 0;
    this.madnessEffects = (seed.madnessEffects ?? []).map((e) => ({ ...e }));
    this.madnessProtection = seed.madnessProtection ?? false;
    this.potentialSanGain = seed.potentialSanGain ?? 0;
  }

  getSanityState(state: GameStateSnapshot): SanityState {
    return deriveSanityState(state, this.sanityThresholds);
  }

  canActivate(state: GameStateSnapshot): boolean {
    if (!super.canActivate(state)) return false;
    if (
      this.requiredSanityState !== null &&
      this.getSanityState(state) !== this.requiredSanityState
    ) {
      return false;
    }
    return readNumber(state.cosmicInsight, 0) >= this.cosmicInsightRequired;
  }

  calculateSanRisk(state: GameStateSnapshot): number {
    let risk = this.sanRiskLevel + SANITY_RISK_MODIFIERS[this.getSanityState(state)];
    if (this.madnessProtection || state.madnessProtection === true) {
      risk -= PROTECTION_REDUCTION;
    }
    return clamp(risk, MIN_RISK, MAX_RISK);
  }

  /**
   * Lowers SAN in the snapshot (never below 0), records the loss, and lets
   * madness effects take hold.
   */
  applySanLoss(state: GameStateSnapshot, amount: number, reason = ""): void {
    if (amount <= 0) return;

    const before = readSanity(state);
    const after = Math.max(0, before - amount);
    this.cumulativeSanLoss += amount;
    state.sanity = after;

    const event = this.recordSanityEvent("loss", amount, reason, before, after);
    this.logEvent("san_loss_applied", { ...event });
    logger.warn(`SAN loss applied: ${amount} points - ${reason}`, LogCategory.SANITY, {
      objectiveId: this.objectiveId,
    });

    this.checkMadnessThreshold(state);
  }

  /**
   * Raises SAN in the snapshot up to `maxSanity`. Returns the points restored.
   */
  applySanGain(state: GameStateSnapshot, amount: number, reason = ""): number {
    const before = readSanity(state);
    const maxSanity = readNumber(state.maxSanity, DEFAULT_MAX_SANITY);
    const gain = Math.min(amount, maxSanity - before);
    if (gain <= 0) return 0;

    state.sanity = before + gain;
    const event = this.recordSanityEvent("gain", gain, reason, before, before + gain);
    this.logEvent("san_gain_applied", { ...event });
    logger.info(`SAN restored: ${gain} points - ${reason}`, LogCategory.SANITY);
    return gain;
  }

  private recordSanityEvent(
    kind: SanityEvent["kind"],
    amount: number,
    reason: string,
    sanityBefore: number,
    sanityAfter: number,
  ): SanityEvent {
    const event: SanityEvent = {
      timestamp: new Date().toISOString(),
      kind,
      amount,
      reason,
      sanityBefore,
      sanityAfter,
      cumulativeLoss: this.cumulativeSanLoss,
    };
    this.sanityEvents.push(event);
    if (this.sanityEvents.length > MAX_SANITY_EVENTS) {
      this.sanityEvents = this.sanityEvents.slice(-MAX_SANITY_EVENTS);
    }
    return event;
  }

  private checkMadnessThreshold(state: GameStateSnapshot): void {
    const sanityState = this.getSanityState(state);
    for (const effect of this.madnessEffects) {
      const active = readStringList(state.activeMadness);
      if (active.includes(effect.madnessType)) continue;
      if (!madnessCanTrigger(sanityState, effect.severity)) continue;
      this.applyMadnessEffect(effect, state, active);
    }
  }

  private applyMadnessEffect(
    effect: MadnessEffect,
    state: GameStateSnapshot,
    active: string[],
  ): void {
    state.activeMadness = [...active, effect.madnessType];
    for (const [behavior, change] of Object.entries(effect.behavioralChanges ?? {})) {
      state[behavior] = change;
    }

    const mods = effect.objectiveModifications;
    if (mods !== undefined) {
      const now = Date.now();
      this.modifiers.apply({
        source: `madness:${effect.madnessType}`,
        priorityDelta: mods.priorityChange,
        timePressureMinutes: mods.timePressureMinutes,
        addedActions: mods.addCompulsion === undefined ? undefined : [mods.addCompulsion],
        appliedAt: now,
        expiresAt:
          effect.durationHours === undefined ? null : now + effect.durationHours * HOUR_MS,
      });
    }

    this.logEvent("madness_effect_applied", {
      madness_type: effect.madnessType,
      severity: effect.severity,
      duration: effect.durationHours ?? null,
    });
    logger.warn(
      `Madness effect applied: ${effect.madnessType} (severity ${effect.severity})`,
      LogCategory.SANITY,
    );
  }

  /**
   * Compulsions added by madness modifiers that have not been acted out yet.
   */
  getPendingCompulsions(): string[] {
    return [...this.modifiers.addedActions()].filter((a) => !this.performedActions.has(a));
  }

  protected trackAction(action?: ActionData): void {
    if (action?.actionType !== undefined) this.performedActions.add(action.actionType);
  }

  update(state: GameStateSnapshot, action?: ActionData): boolean {
    if (this.isActive) this.trackAction(action);
    return super.update(state, action);
  }

  checkCompletion(state: GameStateSnapshot): boolean {
    if (this.getPendingCompulsions().length > 0) return false;
    return super.checkCompletion(state);
  }

  getSanityEvents(): readonly SanityEvent[] {
    return this.sanityEvents;
  }

  getCumulativeSanLoss(): number {
    return this.cumulativeSanLoss;
  }

  protected describeDetails(): Record<string, unknown> {
    return {
      sanRiskLevel: this.sanRiskLevel,
      requiredSanityState: this.requiredSanityState,
      cumulativeSanLoss: this.cumulativeSanLoss,
      pendingCompulsions: this.getPendingCompulsions(),
      potentialSanGain: this.potentialSanGain,
    };
  }

  protected getState(): Record<string, unknown> {
    return {
      sanRiskLevel: this.sanRiskLevel,
      cumulativeSanLoss: this.cumulativeSanLoss,
      performedActions: [...this.performedActions],
      sanityEvents: this.sanityEvents.map((e) => ({ ...e })),
    };
  }

  protected restoreState(state: Record<string, unknown>): void {
    this.sanRiskLevel = readNumber(state.sanRiskLevel, this.sanRiskLevel);
    this.cumulativeSanLoss = readNumber(state.cumulativeSanLoss, 0);
    this.performedActions = new Set(readStringList(state.performedActions));
    const events = Array.isArray(state.sanityEvents) ? state.sanityEvents : [];
    this.sanityEvents = events.filter(isRecord).map((e): SanityEvent => ({
      timestamp: typeof e.timestamp === "string" ? e.timestamp : "",
      kind: e.kind === "gain" ? "gain" : "loss",
      amount: readNumber(e.amount, 0),
      reason: typeof e.reason === "string" ? e.reason : "",
      sanityBefore: readNumber(e.sanityBefore, 0),
      sanityAfter: readNumber(e.sanityAfter, 0),
      cumulativeLoss: readNumber(e.cumulativeLoss, 0),
    }));
  }
}
