import { ObjectiveKind } from "@/shared/constants/ObjectiveEnums";
import { SanityState } from "@/shared/constants/SanityEnums";
import { RandomUtils } from "@/shared/utils/RandomUtils";
import { readString } from "@/shared/utils/snapshotUtils";
import type { ActionData, GameStateSnapshot } from "@/domain/types/game-types";
import type { ObjectiveSeed } from "../core/Objective";
import type { StateConfiguration } from "../schemas";
import { SanityIntegratedObjective } from "./SanityIntegratedObjective";

const STATE_MODIFIER_SOURCE = "sanity_state";
const MAD_INSIGHT_ADVANCEMENT = 0.3;
const MAD_ACCIDENT_CHANCE = 0.1;
const MAD_ACCIDENT_ADVANCEMENT = 0.1;
const DESPERATE_ADVANCEMENT = 0.2;
const DESPERATE_RISK_LIMIT = 3;
const DISTURBED_ADVANCEMENT = 0.05;
const NORMAL_ADVANCEMENT = 0.1;

function isSanityState(value: string): value is SanityState {
  return Object.values<string>(SanityState).includes(value);
}

/**
 * Objective whose goals and methods shift with the character's mental state.
 *
 * Each state may carry a configuration (title suffix, description override,
 * priority modifier, SAN-loss multiplier, completion bonus). Progress rules
 * differ per state: mad minds advance through insight or accident, unhinged
 * ones through desperate action, disturbed ones slowly.
 */
export class SanityDependentObjective extends SanityIntegratedObjective {
  readonly kind: string = ObjectiveKind.SANITY_DEPENDENT;

  protected readonly stateConfigurations: Partial<Record<SanityState, StateConfiguration>>;
  protected configuredState: SanityState | null = null;
  protected baseTitle: string;
  protected baseDescription: string;

  constructor(objectiveId: string, seed: ObjectiveSeed = {}) {
    super(objectiveId, seed);
    this.stateConfigurations = { ...(seed.stateConfigurations ?? {}) };
    this.baseTitle = this.title;
    this.baseDescription = this.description;
  }

  get currentConfiguration(): StateConfiguration {
    if (this.configuredState === null) return {};
    return this.stateConfigurations[this.configuredState] ?? {};
  }

  updateProgress(state: GameStateSnapshot, action?: ActionData): boolean {
    if (!this.isActive) return false;

    const sanityState = this.getSanityState(state);
    this.configureForState(sanityState);

    const progressMade = this.advanceForState(sanityState, state, action);
    if (action !== undefined && progressMade) {
      this.applySanityEffects(sanityState, state);
    }
    return progressMade;
  }

  /**
   * Switches to the configuration of the given state, or back to the base
   * definition when the state has none.
   */
  private configureForState(sanityState: SanityState): void {
    const target = sanityState in this.stateConfigurations ? sanityState : null;
    if (target === this.configuredState) return;

    this.configuredState = target;
    const config = this.currentConfiguration;
    this.title =
      config.titleSuffix === undefined ? this.baseTitle : `${this.baseTitle} (${config.titleSuffix})`;
    this.description = config.descriptionOverride ?? this.baseDescription;

    if (config.priorityModifier === undefined) {
      this.modifiers.removeBySource(STATE_MODIFIER_SOURCE);
    } else {
      this.modifiers.apply({
        source: STATE_MODIFIER_SOURCE,
        priorityDelta: config.priorityModifier,
      });
    }

    this.logEvent("configuration_updated", {
      sanity_state: sanityState,
      new_config: { ...config },
    });
  }

  private advanceForState(
    sanityState: SanityState,
    state: GameStateSnapshot,
    action?: ActionData,
  ): boolean {
    const actionType = action?.actionType;
    if (actionType === undefined || actionType === "") return false;

    switch (sanityState) {
      case SanityState.MAD:
        if (actionType === "mad_insight") {
          return this.advance(MAD_INSIGHT_ADVANCEMENT);
        }
        if (
          (actionType === "random_action" || actionType === "compulsive_behavior") &&
          RandomUtils.chance(MAD_ACCIDENT_CHANCE)
        ) {
          return this.advance(MAD_ACCIDENT_ADVANCEMENT);
        }
        return false;
      case SanityState.UNHINGED:
        if (!actionType.includes("desperate") && !actionType.includes("reckless")) {
          return false;
        }
        this.advance(DESPERATE_ADVANCEMENT);
        if (this.calculateSanRisk(state) > DESPERATE_RISK_LIMIT) {
          this.applySanLoss(state, 1, "Desperate action while unhinged");
        }
        return true;
      case SanityState.DISTURBED:
        return this.advance(DISTURBED_ADVANCEMENT);
      default:
        return this.advance(NORMAL_ADVANCEMENT);
    }
  }

  private advance(amount: number): boolean {
    this.setProgress(Math.min(1, this.progress + amount));
    return true;
  }

  private applySanityEffects(sanityState: SanityState, state: GameStateSnapshot): void {
    const config = this.currentConfiguration;

    if (config.sanLossMultiplier !== undefined) {
      const loss = Math.floor(this.calculateSanRisk(state) * config.sanLossMultiplier);
      if (loss > 0) this.applySanLoss(state, loss, `Action while ${sanityState}`);
    }

    if (
      this.progress >= 1 &&
      (sanityState === SanityState.DISTURBED || sanityState === SanityState.UNHINGED) &&
      config.completionSanBonus !== undefined
    ) {
      this.applySanGain(state, config.completionSanBonus, "Success despite mental distress");
    }
  }

  protected describeDetails(): Record<string, unknown> {
    return {
      ...super.describeDetails(),
      configuredState: this.configuredState,
      configuredStates: Object.keys(this.stateConfigurations),
    };
  }

  protected getState(): Record<string, unknown> {
    return {
      ...super.getState(),
      configuredState: this.configuredState,
      baseTitle: this.baseTitle,
      baseDescription: this.baseDescription,
    };
  }

  protected restoreState(state: Record<string, unknown>): void {
    super.restoreState(state);
    const configured = readString(state.configuredState);
    this.configuredState = isSanityState(configured) ? configured : null;
    this.baseTitle = readString(state.baseTitle, this.baseTitle);
    this.baseDescription = readString(state.baseDescription, this.baseDescription);
  }
}
