import { ConditionCheck } from "@/shared/constants/ObjectiveEnums";
import type { GameStateSnapshot } from "@/domain/types/game-types";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  errorMessage,
  readNumber,
  readStringList,
} from "@/shared/utils/snapshotUtils";
import type { ConditionInput } from "../schemas";

export type ConditionCheckFn = (
  state: GameStateSnapshot,
  requiredValue: unknown,
  metadata: Record<string, unknown>,
) => boolean;

const NAMED_CHECKS: Record<ConditionCheck, ConditionCheckFn> = {
  [ConditionCheck.HAS_ITEM]: (state, item) =>
    readStringList(state.inventory).includes(String(item)),
  [ConditionCheck.MIN_SANITY]: (state, threshold) =>
    readNumber(state.sanity, 0) >= readNumber(threshold, 0),
  [ConditionCheck.LOCATION]: (state, location) =>
    state.currentLocation === location,
};

/**
 * Predicate evaluated against a game state snapshot, used to gate activation
 * and completion.
 *
 * A condition either names a built-in check, carries an inline check, or
 * compares `state[conditionId]` with the required value. Inline checks are
 * not persisted.
 */
export class ObjectiveCondition {
  readonly metadata: Record<string, unknown>;

  constructor(
    readonly conditionId: string,
    readonly description: string,
    readonly requiredValue: unknown = null,
    private readonly check?: ConditionCheck | ConditionCheckFn,
    metadata: Record<string, unknown> = {},
  ) {
    this.metadata = { ...metadata };
  }

  static from(input: ConditionInput | ObjectiveCondition): ObjectiveCondition {
    if (input instanceof ObjectiveCondition) return input;
    return new ObjectiveCondition(
      input.conditionId,
      input.description ?? "",
      input.requiredValue ?? null,
      input.check,
      input.metadata,
    );
  }

  evaluate(state: GameStateSnapshot): boolean {
    if (this.check === undefined) {
      return (
        this.conditionId in state &&
        state[this.conditionId] === this.requiredValue
      );
    }

    const checkFn =
      typeof this.check === "function" ? this.check : NAMED_CHECKS[this.check];
    try {
      return checkFn(state, this.requiredValue, this.metadata);
    } catch (error) {
      logger.error(
        `Error evaluating condition ${this.conditionId}: ${errorMessage(error)}`,
        LogCategory.OBJECTIVES,
      );
      return false;
    }
  }

  toJSON(): ConditionInput {
    return {
      conditionId: this.conditionId,
      description: this.description,
      requiredValue: this.requiredValue,
      check: typeof this.check === "string" ? this.check : undefined,
      metadata: { ...this.metadata },
    };
  }
}

export function createBasicCondition(
  conditionId: string,
  description: string,
  requiredValue: unknown,
): ObjectiveCondition {
  return new ObjectiveCondition(conditionId, description, requiredValue);
}

export function createLocationCondition(location: string): ObjectiveCondition {
  return new ObjectiveCondition(
    "currentLocation",
    `Must be at ${location}`,
    location,
    ConditionCheck.LOCATION,
  );
}

export function createItemCondition(item: string): ObjectiveCondition {
  return new ObjectiveCondition(
    "has_item",
    `Must have ${item}`,
    item,
    ConditionCheck.HAS_ITEM,
  );
}

export function createSanityThresholdCondition(
  minSanity: number,
): ObjectiveCondition {
  return new ObjectiveCondition(
    "sanity_check",
    `Must have at least ${minSanity} SAN`,
    minSanity,
    ConditionCheck.MIN_SANITY,
  );
}
