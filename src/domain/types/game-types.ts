/**
 * Snapshots exchanged with the external turn loop.
 *
 * The game loop owns both maps and hands them over every turn. Objectives read
 * the fields they understand; sanity-integrated objectives also write SAN,
 * madness and knowledge fields back in place.
 *
 * @module domain/types/game-types
 */

/**
 * Game state snapshot for one turn.
 */
export interface GameStateSnapshot {
  /** Current SAN value */
  sanity?: number;
  /** Ceiling for SAN restoration */
  maxSanity?: number;
  temporaryInsanity?: boolean;
  cosmicInsight?: number;
  /** Madness types currently affecting the character */
  activeMadness?: string[];
  madnessSeverity?: number;
  /** Reduces SAN risk when set */
  madnessProtection?: boolean;
  cosmicKnowledge?: string[];
  specialAbilities?: string[];
  inventory?: string[];
  currentLocation?: string;
  campaignId?: string;
  characterId?: string;
  tensionLevel?: number;
  storyPhase?: string;
  npcsPresent?: string[];
  threatLevel?: number;
  [key: string]: unknown;
}

/**
 * Description of the player's action for one turn.
 */
export interface ActionData {
  actionType?: string;
  discovery?: string;
  milestoneCompleted?: boolean;
  investigationBranch?: string;
  /** Amount an investigation branch advances (default 0.1) */
  advancement?: number;
  storyBeatCompleted?: boolean;
  skillUsed?: string;
  /** SAN lost during the action */
  sanLoss?: number;
  revelation?: string;
  phaseAdvancement?: number;
  phaseIndex?: number;
  mythosKnowledge?: { entity: string; levelGain?: number };
  themeEncounter?: string;
  worldChange?: unknown;
  npcRelationship?: { npc: string; change: number };
  /** Session length in hours */
  sessionDuration?: number;
  masteryAdvancement?: { category: string; skill: string; advancement?: number };
  patternLearned?: string;
  survivalStrategy?: string;
  strategySuccess?: boolean;
  cosmicRevelation?: string;
  insightValue?: number;
  [key: string]: unknown;
}
