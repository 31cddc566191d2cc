import type { ZodError } from "zod";
import { CountdownError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import type { ValidationIssue } from "./types.js";

/**
 * Coerce anything thrown into a `CountdownError`. Foreign errors become
 * `INTERNAL_ERROR` with the original kept as `cause`.
 */
export function wrapError(error: unknown, traceId?: string): CountdownError {
  if (error instanceof CountdownError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError({
      code: "INTERNAL_ERROR",
      message: error.message,
      metadata: { originalName: error.name },
      traceId,
      cause: error,
    });
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message, undefined, traceId);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Map Zod issues to field-level validation issues.
 * Top-level issues (empty path) are reported against `fallbackField`.
 */
export function toValidationIssues(error: ZodError, fallbackField = "input"): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : fallbackField,
    message: issue.message,
    code: issue.code,
  }));
}

/** 5xx: the failure is ours, not the caller's. */
export function isServerError(status: number): boolean {
  return status >= 500 && status < 600;
}
