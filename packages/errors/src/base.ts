import {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
} from "./catalog.js";
import type { BridgeErrorOptions } from "./types.js";

/**
 * Serialized form of a BridgeError, used for logs and event metadata.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly code: ErrorCode;
  readonly message: string;
  readonly httpStatus: number;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly metadata?: Record<string, string>;
  readonly traceId?: string;
  readonly timestamp: string;
}

/**
 * Abstract root of every fnbridge error.
 *
 * Catalog fields (httpStatus, grpcCode, domain, isExpected) are looked up
 * from the error code, so subclasses only declare their `_tag`.
 */
export abstract class BridgeError<C extends ErrorCode = ErrorCode> extends Error {
  abstract readonly _tag: BaseErrorType;
  readonly code: C;
  readonly httpStatus: number;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(options: BridgeErrorOptions<C>) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    const entry: ErrorCatalogEntry = ERROR_CATALOG[options.code];
    this.name = new.target.name;
    this.code = options.code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.metadata = options.metadata;
    this.traceId = options.traceId;
    this.timestamp = new Date();
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      domain: this.domain,
      ...(this.metadata !== undefined ? { metadata: this.metadata } : {}),
      ...(this.traceId !== undefined ? { traceId: this.traceId } : {}),
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Check if a value is a BridgeError
 */
export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

/**
 * Check if a value is an Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
