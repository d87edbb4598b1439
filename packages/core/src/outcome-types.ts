// ---------------------------------------------------------------------------
// Call outcomes
// ---------------------------------------------------------------------------

/**
 * Result of an engine call. Failures are values, not throws: the engine
 * reports `{ ok: false }` for provider errors and malformed responses.
 */
export type CallOutcome<T, E = unknown> = CallSuccess<T> | CallFailure<E>;

export interface CallSuccess<T> {
  readonly ok: true;
  readonly data: T;
}

export interface CallFailure<E = unknown> {
  readonly ok: false;
  readonly error: E;
}

export function success<T>(data: T): CallSuccess<T> {
  return { ok: true, data };
}

export function failure<E>(error: E): CallFailure<E> {
  return { ok: false, error };
}

/**
 * Structural check for a CallOutcome coming from untyped code.
 */
export function isCallOutcome(value: unknown): value is CallOutcome<unknown> {
  if (value === null || typeof value !== "object" || !("ok" in value)) {
    return false;
  }
  if (value.ok === true) {
    return "data" in value;
  }
  return value.ok === false && "error" in value;
}
