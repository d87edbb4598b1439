/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the fnbridge packages maps to an HTTP status,
 * a gRPC canonical code and one of the behavioral base error types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, engine, client, stream, telemetry, validation
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "ConflictError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export type GrpcStatusCode =
  | "OK"
  | "CANCELLED"
  | "UNKNOWN"
  | "INVALID_ARGUMENT"
  | "DEADLINE_EXCEEDED"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "PERMISSION_DENIED"
  | "RESOURCE_EXHAUSTED"
  | "FAILED_PRECONDITION"
  | "ABORTED"
  | "OUT_OF_RANGE"
  | "UNIMPLEMENTED"
  | "INTERNAL"
  | "UNAVAILABLE"
  | "DATA_LOSS"
  | "UNAUTHENTICATED";

export type ErrorDomain = "internal" | "engine" | "client" | "stream" | "telemetry" | "validation";

export interface ErrorCatalogEntry {
  readonly domain: ErrorDomain;
  readonly httpStatus: number;
  readonly grpcCode: GrpcStatusCode;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly title: string;
  readonly description: string;
}

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL",
    baseType: "InternalError",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  INTERNAL_UNAVAILABLE: {
    domain: "internal",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Service unavailable",
    description: "A dependency is temporarily unavailable",
  },

  // ============================================================================
  // ENGINE ERRORS - Prompt-execution engine calls
  // ============================================================================
  ENGINE_CALL_FAILED: {
    domain: "engine",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Engine call failed",
    description: "The prompt-execution engine failed to evaluate the function",
  },
  ENGINE_FUNCTION_NOT_FOUND: {
    domain: "engine",
    httpStatus: 404,
    grpcCode: "NOT_FOUND",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Function not found",
    description: "The client does not expose a function with this name",
  },
  ENGINE_RESPONSE_INVALID: {
    domain: "engine",
    httpStatus: 502,
    grpcCode: "DATA_LOSS",
    baseType: "ValidationError",
    isExpected: false,
    title: "Invalid engine response",
    description: "The engine returned data that does not match the expected shape",
  },

  // ============================================================================
  // CLIENT ERRORS - Client registry
  // ============================================================================
  CLIENT_NOT_CONFIGURED: {
    domain: "client",
    httpStatus: 404,
    grpcCode: "NOT_FOUND",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Client not configured",
    description: "No client is registered under this name",
  },
  CLIENT_ALREADY_REGISTERED: {
    domain: "client",
    httpStatus: 409,
    grpcCode: "ALREADY_EXISTS",
    baseType: "ConflictError",
    isExpected: true,
    title: "Client already registered",
    description: "A client with this name is already registered",
  },

  // ============================================================================
  // STREAM ERRORS - Streaming bridge
  // ============================================================================
  STREAM_READ_TIMEOUT: {
    domain: "stream",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED",
    baseType: "TimeoutError",
    isExpected: false,
    title: "Stream read timeout",
    description: "No stream message arrived within the read deadline",
  },
  STREAM_FAILED: {
    domain: "stream",
    httpStatus: 502,
    grpcCode: "ABORTED",
    baseType: "ExternalError",
    isExpected: false,
    title: "Stream failed",
    description: "The engine reported a failure while streaming",
  },

  // ============================================================================
  // TELEMETRY / VALIDATION ERRORS
  // ============================================================================
  TELEMETRY_CONFIG_INVALID: {
    domain: "telemetry",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid telemetry configuration",
    description: "The telemetry configuration failed validation",
  },
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },
} as const satisfies Record<string, ErrorCatalogEntry>;

export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Error codes whose catalog entry maps to base type `B`.
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
