import type { Tagged, TagOf, VariantOf, PayloadOf } from "./types";

/**
 * One handler per tag. Leaving a tag out is a compile error, which is what
 * forces every dispatch site to be revisited when a variant is added.
 */
export type Handlers<V extends Tagged, R> = {
  readonly [T in TagOf<V>]: (variant: VariantOf<V, T>) => R;
};

export function match<V extends Tagged, R>(value: V, handlers: Handlers<V, R>): R {
  const tag: TagOf<V> = value.tag;
  const handler = handlers[tag];
  // the mapped type pairs each tag with a handler for exactly that member
  return (handler as unknown as (variant: V) => R)(value);
}

function hasPayload<V extends Tagged>(value: V): value is V & { readonly payload: PayloadOf<V> } {
  return "payload" in value;
}

export function payloadOf<V extends Tagged>(value: V): PayloadOf<V> | undefined {
  if (hasPayload(value)) {
    return value.payload;
  }
  return undefined;
}
