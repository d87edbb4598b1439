import type { ZodType } from "zod";

/**
 * One shape a multi-shape function result may take.
 */
export interface VariantSpec<K extends string = string> {
  readonly type: K;
  readonly matches: (value: unknown) => boolean;
}

/**
 * A result labelled with the first variant that matched it. `type` is
 * undefined when none did.
 */
export interface TaggedVariant<K extends string = string> {
  readonly type: K | undefined;
  readonly value: unknown;
}

export function tagVariant<K extends string>(
  result: unknown,
  variants: readonly VariantSpec<K>[],
): TaggedVariant<K> {
  for (const variant of variants) {
    if (variant.matches(result)) {
      return Object.freeze({ type: variant.type, value: result });
    }
  }
  return Object.freeze({ type: undefined, value: result });
}

/** Variant matched by a zod schema */
export function schemaVariant<K extends string>(type: K, schema: ZodType): VariantSpec<K> {
  return { type, matches: (value) => schema.safeParse(value).success };
}

/**
 * Build a resolver that tags raw results before they are wrapped.
 */
export function variantResolver<K extends string>(
  variants: readonly VariantSpec<K>[],
): (data: unknown) => TaggedVariant<K> {
  return (data) => tagVariant(data, variants);
}
