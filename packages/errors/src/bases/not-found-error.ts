import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "../catalog.js";
import { CountdownError } from "../base.js";
import type { CountdownErrorOptions, NotFoundCodes } from "../types.js";

/**
 * Errors raised when a requested resource or route does not exist.
 * HTTP 404.
 */
export class NotFoundError extends CountdownError {
  readonly _tag = "NotFoundError" as const;
  override readonly code: NotFoundCodes;
  override readonly httpStatus: HttpStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: CountdownErrorOptions<NotFoundCodes>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | CountdownErrorOptions<NotFoundCodes>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: CountdownErrorOptions<NotFoundCodes> =
      typeof messageOrOptions === "string"
        ? { code: "ROUTE_NOT_FOUND", message: messageOrOptions, metadata, traceId }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
