import { ObjectiveErrorCode } from "@/shared/constants/ErrorEnums";

/**
 * Programmer or configuration mistake while creating objectives: duplicate
 * ids, unknown kinds or templates, invalid options. Never raised for gameplay
 * outcomes, and not meant to be swallowed by the turn loop.
 */
export class ObjectiveManagerError extends Error {
  constructor(
    readonly code: ObjectiveErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ObjectiveManagerError";
  }
}
