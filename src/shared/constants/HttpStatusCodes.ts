/**
 * HTTP status code enumerations for API responses.
 *
 * @module shared/constants/HttpStatusCodes
 */

/**
 * Enumeration of the HTTP status codes the controllers answer with.
 */
export enum HttpStatusCode {
  OK = 200,
  CREATED = 201,

  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  CONFLICT = 409,

  INTERNAL_SERVER_ERROR = 500,
}
