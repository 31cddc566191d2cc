/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by the countdown packages is declared here.
 * Each code maps to an HTTP status, a domain and one of the base error types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, validation, config, timer, http, persistence, push
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "NotFoundError" | "ExternalError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    baseType: "InternalError",
    isExpected: false,
    title: "Internal server error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // VALIDATION ERRORS - Bad input from callers or operators
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Validation failed",
    description: "The request parameters failed validation",
  },
  CONFIG_INVALID: {
    domain: "config",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid configuration",
    description: "The server configuration is invalid",
  },
  TIMER_INVALID_DURATION: {
    domain: "timer",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid duration",
    description: "Timer durations must be finite whole numbers of seconds",
  },

  // ============================================================================
  // HTTP ERRORS - Routing on the control surface
  // ============================================================================
  ROUTE_NOT_FOUND: {
    domain: "http",
    httpStatus: 404,
    baseType: "NotFoundError",
    isExpected: true,
    title: "Route not found",
    description: "No control endpoint exists at this path",
  },
  METHOD_NOT_ALLOWED: {
    domain: "http",
    httpStatus: 405,
    baseType: "ValidationError",
    isExpected: true,
    title: "Method not allowed",
    description: "The endpoint does not accept this HTTP method",
  },

  // ============================================================================
  // PERSISTENCE ERRORS - Snapshot file I/O
  // ============================================================================
  PERSISTENCE_READ_FAILED: {
    domain: "persistence",
    httpStatus: 503,
    baseType: "ExternalError",
    isExpected: false,
    title: "Snapshot read failed",
    description: "The timer snapshot could not be read from storage",
  },
  PERSISTENCE_SNAPSHOT_INVALID: {
    domain: "persistence",
    httpStatus: 500,
    baseType: "ExternalError",
    isExpected: false,
    title: "Snapshot invalid",
    description: "The stored timer snapshot is malformed or incomplete",
  },
  PERSISTENCE_WRITE_FAILED: {
    domain: "persistence",
    httpStatus: 503,
    baseType: "ExternalError",
    isExpected: false,
    title: "Snapshot write failed",
    description: "The timer snapshot could not be written to storage",
  },

  // ============================================================================
  // PUSH ERRORS - Subscriber delivery
  // ============================================================================
  PUSH_SEND_FAILED: {
    domain: "push",
    httpStatus: 502,
    baseType: "ExternalError",
    isExpected: true,
    title: "Push delivery failed",
    description: "A subscriber connection could not receive an update",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
