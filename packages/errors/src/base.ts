import type { BaseErrorType, ErrorCode, ErrorDomain, HttpStatusCode } from "./catalog.js";

/**
 * Plain-object form of a CountdownError, safe to log or serialize.
 */
export interface ErrorJSON {
  _tag: BaseErrorType;
  name: string;
  code: ErrorCode;
  message: string;
  httpStatus: HttpStatusCode;
  domain: ErrorDomain;
  isExpected: boolean;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  timestamp: string;
  stack?: string | undefined;
}

/**
 * Root of the error hierarchy.
 *
 * Subclasses fill in `code`, `httpStatus`, `domain` and `isExpected`
 * from the catalog entry of their code.
 */
export abstract class CountdownError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      domain: this.domain,
      isExpected: this.isExpected,
      metadata: this.metadata,
      traceId: this.traceId,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    if (this.traceId) {
      str += ` [trace: ${this.traceId}]`;
    }
    return str;
  }
}

/**
 * Type guard for CountdownError instances
 */
export function isCountdownError(error: unknown): error is CountdownError {
  return error instanceof CountdownError;
}

/**
 * Type guard for Error instances
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
