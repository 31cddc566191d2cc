/**
 * @countdown/errors
 *
 * Shared error taxonomy for the countdown packages.
 *
 * Four behavioral base types: ValidationError, NotFoundError,
 * ExternalError, InternalError. Each error carries a `.code` from the
 * catalog that discriminates the specific condition. Use
 * `error.code === "XXX"` for fine-grained matching, or
 * `instanceof BaseType` for category matching.
 */

export const PACKAGE_NAME = "@countdown/errors" as const;

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { CountdownError, type ErrorJSON, isCountdownError, isError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getErrorMessage,
  isServerError,
  toValidationIssues,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError, InternalError, NotFoundError, ValidationError } from "./bases/index.js";

export type {
  CountdownErrorOptions,
  ExternalCodes,
  InternalCodes,
  NotFoundCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// WIRE FORMAT
// ============================================================================

export {
  PROBLEM_CONTENT_TYPE,
  type ProblemDetails,
  ProblemDetailsSchema,
  ValidationIssueSchema,
} from "./wire/rfc9457.js";

export { serializeToRFC9457 } from "./serialization.js";
