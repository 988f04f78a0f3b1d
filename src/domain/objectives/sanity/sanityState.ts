import { SanityState } from "@/shared/constants/SanityEnums";
import { readNumber } from "@/shared/utils/snapshotUtils";
import type { GameStateSnapshot } from "@/domain/types/game-types";
import type { SanityThresholds } from "../schemas";

export const DEFAULT_SANITY = 50;
export const DEFAULT_MAX_SANITY = 99;

export const DEFAULT_SANITY_THRESHOLDS: Readonly<SanityThresholds> = {
  stable: 70,
  stressed: 50,
  disturbed: 30,
  unhinged: 10,
};

/**
 * Risk added on top of an objective's base SAN risk for each mental state.
 */
export const SANITY_RISK_MODIFIERS: Readonly<Record<SanityState, number>> = {
  [SanityState.STABLE]: 0,
  [SanityState.STRESSED]: 1,
  [SanityState.DISTURBED]: 2,
  [SanityState.UNHINGED]: 3,
  [SanityState.MAD]: 5,
  [SanityState.TEMPORARILY_INSANE]: 3,
};

export function readSanity(state: GameStateSnapshot): number {
  return readNumber(state.sanity, DEFAULT_SANITY);
}

/**
 * Derives the mental state from the snapshot. Never cached: SAN can change
 * between two reads within the same turn.
 */
export function deriveSanityState(
  state: GameStateSnapshot,
  thresholds: SanityThresholds = DEFAULT_SANITY_THRESHOLDS,
): SanityState {
  if (state.temporaryInsanity === true) return SanityState.TEMPORARILY_INSANE;

  const sanity = readSanity(state);
  if (sanity >= thresholds.stable) return SanityState.STABLE;
  if (sanity >= thresholds.stressed) return SanityState.STRESSED;
  if (sanity >= thresholds.disturbed) return SanityState.DISTURBED;
  if (sanity >= thresholds.unhinged) return SanityState.UNHINGED;
  return SanityState.MAD;
}

/**
 * Whether a madness effect of the given severity may take hold in this state.
 */
export function madnessCanTrigger(state: SanityState, severity: number): boolean {
  switch (state) {
    case SanityState.DISTURBED:
      return severity >= 3;
    case SanityState.UNHINGED:
      return severity >= 2;
    case SanityState.MAD:
    case SanityState.TEMPORARILY_INSANE:
      return true;
    default:
      return false;
  }
}
