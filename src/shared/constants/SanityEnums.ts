/**
 * Sanity enumerations for sanity-integrated objectives.
 *
 * @module shared/constants/SanityEnums
 */

/**
 * Mental state derived from the SAN value on every evaluation.
 */
export enum SanityState {
  /** SAN 70+ */
  STABLE = "stable",
  /** SAN 50-69 */
  STRESSED = "stressed",
  /** SAN 30-49 */
  DISTURBED = "disturbed",
  /** SAN 10-29 */
  UNHINGED = "unhinged",
  /** SAN below 10 */
  MAD = "mad",
  /** Temporary insanity override */
  TEMPORARILY_INSANE = "temp_insane",
}

/**
 * Levels of cosmic understanding.
 */
export enum CosmicInsightLevel {
  IGNORANT = 0,
  GLIMPSE = 1,
  AWARE = 2,
  KNOWLEDGEABLE = 3,
  ENLIGHTENED = 4,
  TRANSCENDENT = 5,
}

/**
 * Kinds of madness that can take hold of a character.
 */
export enum MadnessType {
  PARANOIA = "paranoia",
  OBSESSION = "obsession",
  PHOBIA = "phobia",
  DELUSION = "delusion",
  COMPULSION = "compulsion",
  AMNESIA = "amnesia",
  COSMIC_AWARENESS = "cosmic_awareness",
}
