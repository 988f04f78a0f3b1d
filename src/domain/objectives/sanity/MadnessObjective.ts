import {
  ObjectiveKind,
  ObjectivePriority,
  ObjectiveScope,
  ObjectiveType,
} from "@/shared/constants/ObjectiveEnums";
import { readNumber, readStringList } from "@/shared/utils/snapshotUtils";
import type { ActionData, GameStateSnapshot } from "@/domain/types/game-types";
import type { ObjectiveSeed } from "../core/Objective";
import { SanityIntegratedObjective } from "./SanityIntegratedObjective";

const BASE_ADVANCEMENT = 0.1;
const LAPSE_PENALTY = 0.1;
const MADNESS_ACTIONS = ["compulsive", "obsessive", "paranoid", "delusional"] as const;

/**
 * An act that only makes sense to a disturbed mind. Activates while the
 * required madness holds, advances faster on madness-driven actions, and
 * loses ground whenever the madness lapses.
 */
export class MadnessObjective extends SanityIntegratedObjective {
  readonly kind: string = ObjectiveKind.MADNESS;

  protected readonly requiredMadnessTypes: ReadonlySet<string>;
  protected readonly minMadnessSeverity: number;
  protected readonly madnessProgressMultiplier: number;
  protected readonly sanityRecoveryOnCompletion: number;

  constructor(objectiveId: string, seed: ObjectiveSeed = {}) {
    super(objectiveId, seed, {
      scope: ObjectiveScope.SHORT_TERM,
      objectiveType: ObjectiveType.RITUAL,
      timeLimitMinutes: null,
    });
    this.requiredMadnessTypes = new Set<string>(seed.requiredMadnessTypes ?? []);
    this.minMadnessSeverity = seed.minMadnessSeverity ?? 1;
    this.madnessProgressMultiplier = seed.madnessProgressMultiplier ?? 2;
    this.sanityRecoveryOnCompletion = seed.sanityRecoveryOnCompletion ?? 5;

    if (this.basePriority < ObjectivePriority.HIGH) {
      this.basePriority = ObjectivePriority.HIGH;
    }
  }

  canActivate(state: GameStateSnapshot): boolean {
    if (!super.canActivate(state)) return false;
    if (this.requiredMadnessTypes.size > 0 && !this.hasRequiredMadness(state)) {
      return false;
    }
    return readNumber(state.madnessSeverity, 0) >= this.minMadnessSeverity;
  }

  private hasRequiredMadness(state: GameStateSnapshot): boolean {
    return readStringList(state.activeMadness).some((m) => this.requiredMadnessTypes.has(m));
  }

  /**
   * Whether the character is still mad in the way this objective needs.
   */
  isMadnessAppropriate(state: GameStateSnapshot): boolean {
    if (this.requiredMadnessTypes.size > 0) return this.hasRequiredMadness(state);
    return (
      readStringList(state.activeMadness).length > 0 ||
      readNumber(state.madnessSeverity, 0) >= this.minMadnessSeverity
    );
  }

  updateProgress(state: GameStateSnapshot, action?: ActionData): boolean {
    if (!this.isActive) return false;

    if (!this.isMadnessAppropriate(state)) {
      this.setProgress(Math.max(0, this.progress - LAPSE_PENALTY));
      this.logEvent("madness_progress_lost", {
        reason: "Inappropriate madness state",
        progress_lost: LAPSE_PENALTY,
      });
      return true;
    }

    const actionType = action?.actionType;
    if (actionType === undefined || !MADNESS_ACTIONS.some((m) => actionType.includes(m))) {
      return false;
    }

    const advancement = BASE_ADVANCEMENT * this.madnessProgressMultiplier;
    this.setProgress(Math.min(1, this.progress + advancement));
    this.logEvent("madness_enhanced_progress", {
      action_type: actionType,
      advancement,
      multiplier: this.madnessProgressMultiplier,
    });
    return true;
  }

  complete(state: GameStateSnapshot): boolean {
    if (!super.complete(state)) return false;
    if (this.sanityRecoveryOnCompletion > 0) {
      this.applySanGain(state, this.sanityRecoveryOnCompletion, "Completing madness-driven objective");
    }
    return true;
  }

  protected describeDetails(): Record<string, unknown> {
    return {
      ...super.describeDetails(),
      requiredMadness: [...this.requiredMadnessTypes],
      minMadnessSeverity: this.minMadnessSeverity,
      progressMultiplier: this.madnessProgressMultiplier,
    };
  }
}
