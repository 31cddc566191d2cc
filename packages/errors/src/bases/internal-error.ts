import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "../catalog.js";
import { CountdownError } from "../base.js";
import type { CountdownErrorOptions, InternalCodes } from "../types.js";

/**
 * Errors caused by bugs or unexpected states.
 * HTTP 500.
 */
export class InternalError extends CountdownError {
  readonly _tag = "InternalError" as const;
  override readonly code: InternalCodes;
  override readonly httpStatus: HttpStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: CountdownErrorOptions<InternalCodes>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | CountdownErrorOptions<InternalCodes>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: CountdownErrorOptions<InternalCodes> =
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_ERROR", message: messageOrOptions, metadata, traceId }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
