/**
 * @fnbridge/errors
 *
 * Shared error taxonomy for the fnbridge packages.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * or `instanceof BaseType` for category matching.
 */

export { BridgeError, type ErrorJSON, isBridgeError, isError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  wrapError,
} from "./utils.js";

export { ConflictError } from "./bases/conflict-error.js";
export { ExternalError } from "./bases/external-error.js";
export { InternalError } from "./bases/internal-error.js";
export { NotFoundError } from "./bases/not-found-error.js";
export { TimeoutError } from "./bases/timeout-error.js";
export { ValidationError, type ValidationErrorOptions } from "./bases/validation-error.js";

export type {
  BridgeErrorOptions,
  ConflictCodes,
  ExternalCodes,
  InternalCodes,
  NotFoundCodes,
  TimeoutCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

export {
  hasCode,
  isConflictError,
  isExpectedError,
  isExternalError,
  isInternalError,
  isNotFoundError,
  isTimeoutError,
  isValidationError,
} from "./guards.js";
