/**
 * Converts a CountdownError to an RFC 9457 problem body.
 */

import type { CountdownError } from "./base.js";
import { ValidationError } from "./bases/validation-error.js";
import { ERROR_CATALOG } from "./catalog.js";
import type { ProblemDetails } from "./wire/rfc9457.js";

/**
 * Serialize a CountdownError to RFC 9457 ProblemDetails format.
 * Uses `.code` as the RFC 9457 `type` discriminator.
 */
export function serializeToRFC9457(error: CountdownError, instance?: string): ProblemDetails {
  const problemDetails: ProblemDetails = {
    type: `/errors/${error.code}`,
    title: ERROR_CATALOG[error.code].title,
    status: error.httpStatus,
    detail: error.message,
    code: error.code,
    domain: error.domain,
    timestamp: error.timestamp.toISOString(),
  };

  if (instance !== undefined) problemDetails.instance = instance;
  if (error.traceId !== undefined) problemDetails.traceId = error.traceId;
  if (error.metadata !== undefined) problemDetails.metadata = error.metadata;

  if (error instanceof ValidationError && error.issues.length > 0) {
    problemDetails.errors = error.issues.map((issue) => ({
      field: issue.field,
      message: issue.message,
      code: issue.code,
      ...(issue.value !== undefined ? { value: issue.value } : {}),
    }));
  }

  return problemDetails;
}
