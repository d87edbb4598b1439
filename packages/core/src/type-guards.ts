import type { UsageCollector } from "./collector-types.js";
import type { Engine } from "./engine-types.js";

/**
 * Narrow an unknown value to a plain string-keyed record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Type guard to check if an object implements the UsageCollector interface.
 *
 * Used when a caller hands over a pre-existing collector from untyped code.
 */
export function isUsageCollector(obj: unknown): obj is UsageCollector {
  if (!isRecord(obj)) {
    return false;
  }

  return (
    typeof obj.id === "string" &&
    typeof obj.name === "string" &&
    typeof obj.usage === "function" &&
    typeof obj.lastFunctionLog === "function"
  );
}

/**
 * Type guard to check if an object implements the Engine interface.
 *
 * Checks for the three required methods: invoke, invokeStream and
 * createCollector.
 */
export function isEngine(obj: unknown): obj is Engine {
  if (!isRecord(obj)) {
    return false;
  }

  if (typeof obj.invoke !== "function") {
    return false;
  }

  if (typeof obj.invokeStream !== "function") {
    return false;
  }

  return typeof obj.createCollector === "function";
}
