import {
  ConsequenceType,
  RewardType,
} from "@/shared/constants/ObjectiveEnums";
import type { ObjectiveConsequence, ObjectiveReward } from "../schemas";

/**
 * Standard reward and consequence configurations shared by factories and
 * templates.
 */
export const STANDARD_REWARDS = {
  KNOWLEDGE: {
    type: RewardType.KNOWLEDGE,
    value: 1,
    description: "Gain insight into the mythos",
  },
  SURVIVAL: {
    type: RewardType.SURVIVAL,
    value: 1,
    description: "Successfully survive the encounter",
  },
  SANITY_MINOR: {
    type: RewardType.SANITY_RESTORATION,
    value: 1,
    description: "Restore 1d3 SAN",
  },
  SANITY_MAJOR: {
    type: RewardType.SANITY_RESTORATION,
    value: 2,
    description: "Restore 1d6 SAN",
  },
} as const satisfies Record<string, ObjectiveReward>;

export const STANDARD_CONSEQUENCES = {
  SAN_LOSS_MINOR: {
    type: ConsequenceType.SAN_LOSS,
    severity: 1,
    description: "Lose 1d3 SAN",
  },
  SAN_LOSS_MAJOR: {
    type: ConsequenceType.SAN_LOSS,
    severity: 3,
    description: "Lose 1d6 SAN",
  },
  ESCALATION_MINOR: {
    type: ConsequenceType.ESCALATION,
    severity: 1,
    description: "Situation becomes more dangerous",
  },
  COSMIC_ATTENTION: {
    type: ConsequenceType.COSMIC_ATTENTION,
    severity: 2,
    description: "Attract unwanted cosmic attention",
  },
} as const satisfies Record<string, ObjectiveConsequence>;

export function describeReward(reward: ObjectiveReward): string {
  return reward.description
    ? `${reward.type}: ${reward.description}`
    : `${reward.type} (${reward.value})`;
}

export function describeConsequence(consequence: ObjectiveConsequence): string {
  return consequence.description
    ? `${consequence.type}: ${consequence.description}`
    : `${consequence.type} (severity ${consequence.severity})`;
}
