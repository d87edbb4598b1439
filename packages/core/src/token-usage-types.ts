import { isRecord } from "./type-guards.js";

/**
 * Canonical token usage type returned with every successful call.
 *
 * `totalTokens` is always `inputTokens + outputTokens`; build values through
 * `toTokenUsage()` so the sum never drifts from its parts.
 */
export interface TokenUsage {
  /** Number of input/prompt tokens */
  readonly inputTokens: number;

  /** Number of output/completion tokens */
  readonly outputTokens: number;

  /** Total tokens (input + output) */
  readonly totalTokens: number;
}

export const ZERO_USAGE: TokenUsage = Object.freeze({
  inputTokens: 0,
  outputTokens: 0,
  totalTokens: 0,
});

function toCount(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Build a TokenUsage from raw counts. Missing, negative or non-numeric
 * counts are treated as 0.
 */
export function toTokenUsage(inputTokens: unknown, outputTokens: unknown): TokenUsage {
  const input = toCount(inputTokens);
  const output = toCount(outputTokens);
  return Object.freeze({ inputTokens: input, outputTokens: output, totalTokens: input + output });
}

/**
 * Type guard for TokenUsage: validates the three numeric fields.
 */
export function isTokenUsage(value: unknown): value is TokenUsage {
  return (
    isRecord(value) &&
    typeof value.inputTokens === "number" &&
    typeof value.outputTokens === "number" &&
    typeof value.totalTokens === "number"
  );
}
