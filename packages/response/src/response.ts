import {
  type CallOutcome,
  isRecord,
  success,
  type TokenUsage,
  type UsageCollector,
} from "@fnbridge/core";
import { extractObservability, extractUsage, type ObservabilityData } from "@fnbridge/telemetry";

export const RESPONSE_BRAND: unique symbol = Symbol.for("fnbridge.response");

/**
 * Successful call result together with the usage the engine recorded for it.
 *
 * Only successful calls are wrapped; error outcomes reach the caller as-is.
 * Frozen on creation.
 */
export interface Response<T> extends ObservabilityData {
  readonly [RESPONSE_BRAND]: true;
  readonly data: T;
  readonly usage: TokenUsage;
  /** The collector the engine wrote to, for further diagnostics */
  readonly collector: UsageCollector;
}

export function createResponse<T>(data: T, collector: UsageCollector): Response<T> {
  return Object.freeze({
    ...extractObservability(collector),
    [RESPONSE_BRAND]: true as const,
    data,
    usage: extractUsage(collector),
    collector,
  });
}

/**
 * Wrap the success branch of an outcome. A failure is returned as the very
 * same object.
 */
export function wrapOutcome<T, E>(
  outcome: CallOutcome<T, E>,
  collector: UsageCollector,
): CallOutcome<Response<T>, E> {
  return outcome.ok ? success(createResponse(outcome.data, collector)) : outcome;
}

export function isResponse(value: unknown): value is Response<unknown> {
  return isRecord(value) && RESPONSE_BRAND in value && value[RESPONSE_BRAND] === true;
}

/**
 * The response's data, or the value itself when it is not a response.
 * `unwrap(unwrap(x))` equals `unwrap(x)`.
 */
export function unwrap<T>(value: Response<T>): T;
export function unwrap<T>(value: T): T;
export function unwrap(value: unknown): unknown {
  return isResponse(value) ? value.data : value;
}

/** Token usage of a response; undefined for anything else */
export function usage(value: unknown): TokenUsage | undefined {
  return isResponse(value) ? value.usage : undefined;
}
