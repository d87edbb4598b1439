import { type CallOutcome, failure, success } from "@fnbridge/core";
import { ValidationError } from "@fnbridge/errors";
import type { TaggedVariant } from "@fnbridge/response";

export type VariantHandlers<K extends string, R> = {
  readonly [P in K]?: (value: unknown) => R | Promise<R>;
};

/**
 * Run the handler registered for a tagged variant's type, as in a
 * tool-selection loop. An untagged variant, or one without a handler, is a
 * VALIDATION_FAILED failure. Handler throws propagate.
 */
export async function dispatchVariant<K extends string, R>(
  variant: TaggedVariant<K>,
  handlers: VariantHandlers<K, R>,
): Promise<CallOutcome<R>> {
  const handler = variant.type === undefined ? undefined : handlers[variant.type];
  if (handler === undefined) {
    return failure(
      new ValidationError({
        code: "VALIDATION_FAILED",
        message: `No handler for variant ${variant.type ?? "(unmatched)"}`,
        issues: [{ field: "type", message: "no handler registered", code: "unhandled_variant" }],
      }),
    );
  }
  return success(await handler(variant.value));
}
