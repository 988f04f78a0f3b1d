import {
  ObjectiveKind,
  ObjectivePriority,
  ObjectiveScope,
  ObjectiveType,
} from "@/shared/constants/ObjectiveEnums";
import { STANDARD_CONSEQUENCES, STANDARD_REWARDS } from "./core/rewards";
import type { ObjectiveOptions } from "./schemas";

/**
 * Named objective blueprint: a registry kind plus the options it is built
 * from. Overrides given at creation time are merged over `options`.
 */
export interface ObjectiveTemplate {
  kind: string;
  options: ObjectiveOptions;
}

export const DEFAULT_TEMPLATES: Readonly<Record<string, ObjectiveTemplate>> = {
  library_investigation: {
    kind: ObjectiveKind.SHORT_TERM,
    options: {
      title: "Investigate the Library",
      description: "Search the library for clues and forbidden knowledge",
      objectiveType: ObjectiveType.INVESTIGATION,
      scope: ObjectiveScope.SHORT_TERM,
      requiredDiscoveries: ["ancient_book", "hidden_note", "strange_symbol"],
      rewards: [STANDARD_REWARDS.KNOWLEDGE],
      consequences: [STANDARD_CONSEQUENCES.SAN_LOSS_MINOR],
    },
  },
  basement_exploration: {
    kind: ObjectiveKind.SHORT_TERM,
    options: {
      title: "Explore the Basement",
      description: "Investigate the basement despite the feeling of dread",
      objectiveType: ObjectiveType.EXPLORATION,
      scope: ObjectiveScope.SHORT_TERM,
      tensionRampEnabled: true,
      initialTension: 2,
      maxTension: 4,
      rewards: [STANDARD_REWARDS.KNOWLEDGE],
      consequences: [STANDARD_CONSEQUENCES.SAN_LOSS_MAJOR],
    },
  },
  npc_interview: {
    kind: ObjectiveKind.IMMEDIATE,
    options: {
      title: "Interview NPC",
      description: "Conduct a thorough interview to gather information",
      objectiveType: ObjectiveType.SOCIAL,
      scope: ObjectiveScope.IMMEDIATE,
      requiredActions: ["ask_about_events", "press_for_details", "conclude_interview"],
      rewards: [STANDARD_REWARDS.KNOWLEDGE],
    },
  },
  cult_investigation: {
    kind: ObjectiveKind.MID_TERM,
    options: {
      title: "Investigate the Cult",
      description: "Uncover the cult's plans and membership",
      objectiveType: ObjectiveType.INVESTIGATION,
      scope: ObjectiveScope.MID_TERM,
      investigationBranches: {
        member_identification: 0,
        ritual_discovery: 0,
        location_mapping: 0,
      },
      horrorRevelations: ["cult_purpose", "ritual_details", "cosmic_connection"],
      rewards: [STANDARD_REWARDS.KNOWLEDGE],
      consequences: [
        STANDARD_CONSEQUENCES.SAN_LOSS_MAJOR,
        STANDARD_CONSEQUENCES.COSMIC_ATTENTION,
      ],
    },
  },
  survival_horror: {
    kind: ObjectiveKind.SHORT_TERM,
    options: {
      title: "Survive the Encounter",
      description: "Survive a terrifying supernatural encounter",
      objectiveType: ObjectiveType.SURVIVAL,
      scope: ObjectiveScope.SHORT_TERM,
      priority: ObjectivePriority.CRITICAL,
      tensionRampEnabled: true,
      initialTension: 3,
      maxTension: 5,
      timeLimitMinutes: 8,
      rewards: [STANDARD_REWARDS.SURVIVAL, STANDARD_REWARDS.SANITY_MINOR],
      consequences: [STANDARD_CONSEQUENCES.SAN_LOSS_MAJOR],
    },
  },
};
