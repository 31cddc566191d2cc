import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "../catalog.js";
import { CountdownError } from "../base.js";
import type { CountdownErrorOptions, ValidationCodes, ValidationIssue } from "../types.js";

type ValidationOptions = CountdownErrorOptions<ValidationCodes> & {
  issues?: readonly ValidationIssue[];
};

/**
 * Errors caused by invalid input, configuration, or request data.
 * HTTP 400-class. The `.code` field discriminates the specific error.
 */
export class ValidationError extends CountdownError {
  readonly _tag = "ValidationError" as const;
  override readonly code: ValidationCodes;
  override readonly httpStatus: HttpStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues (populated for VALIDATION_FAILED) */
  readonly issues: readonly ValidationIssue[];

  constructor(options: ValidationOptions);
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    messageOrOptions: string | ValidationOptions,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: ValidationOptions =
      typeof messageOrOptions === "string"
        ? {
            code: "VALIDATION_FAILED",
            message: messageOrOptions,
            issues: issues ?? [],
            metadata,
            traceId,
          }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = opts.issues ?? [];
  }
}
