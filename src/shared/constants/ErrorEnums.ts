/**
 * Error code enumerations.
 *
 * @module shared/constants/ErrorEnums
 */

/**
 * Codes carried by ObjectiveManagerError, signalling programmer or
 * configuration mistakes rather than gameplay outcomes.
 */
export enum ObjectiveErrorCode {
  DUPLICATE_ID = "duplicate_id",
  UNKNOWN_TYPE = "unknown_type",
  UNKNOWN_TEMPLATE = "unknown_template",
  INVALID_OPTIONS = "invalid_options",
  CREATION_FAILED = "creation_failed",
}
