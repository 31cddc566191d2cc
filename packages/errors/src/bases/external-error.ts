import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "../catalog.js";
import { CountdownError } from "../base.js";
import type { CountdownErrorOptions, ExternalCodes } from "../types.js";

/**
 * Errors caused by storage or transport outside the process.
 * HTTP 5xx-class. The `.code` field discriminates the specific error.
 */
export class ExternalError extends CountdownError {
  readonly _tag = "ExternalError" as const;
  override readonly code: ExternalCodes;
  override readonly httpStatus: HttpStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: CountdownErrorOptions<ExternalCodes>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | CountdownErrorOptions<ExternalCodes>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: CountdownErrorOptions<ExternalCodes> =
      typeof messageOrOptions === "string"
        ? { code: "PERSISTENCE_WRITE_FAILED", message: messageOrOptions, metadata, traceId }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
