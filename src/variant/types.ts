/**
 * A member of a closed variant set. Variant sets are discriminated unions of
 * `Tagged` records; the payload, when a variant has one, lives under `payload`.
 */
export interface Tagged<T extends string = string> {
  readonly tag: T;
}

export type TagOf<V extends Tagged> = V["tag"];

/** The member of `V` whose tag is `T`. */
export type VariantOf<V extends Tagged, T extends TagOf<V>> = Extract<V, { readonly tag: T }>;

/** Union of the payload types of the payload-carrying members of `V`. */
export type PayloadOf<V extends Tagged> = V extends { readonly payload: infer P } ? P : never;

export type Unit<T extends string> = { readonly tag: T };

export type WithPayload<T extends string, P> = { readonly tag: T; readonly payload: P };

export function variant<T extends string>(tag: T): Unit<T>;
export function variant<T extends string, P>(tag: T, payload: P): WithPayload<T, P>;
export function variant<T extends string, P>(tag: T, ...payload: [] | [P]): Unit<T> | WithPayload<T, P> {
  if (payload.length === 0) {
    return { tag };
  }
  return { tag, payload: payload[0] };
}

export function isVariant<V extends Tagged, T extends TagOf<V>>(value: V, tag: T): value is VariantOf<V, T> {
  return value.tag === tag;
}

/**
 * Keys of a table that is total over `T`, typed as `T`.
 */
export function tagsOf<T extends string>(table: { readonly [K in T]: unknown }): T[] {
  return Object.keys(table).filter((key): key is T => Object.prototype.hasOwnProperty.call(table, key));
}
