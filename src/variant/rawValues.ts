import { makeDiagnostic } from "../outcome/codes";
import type { Diagnostic } from "../outcome/diagnostic";
import type { Outcome } from "../outcome/outcome";
import { done, invalidRawValue } from "../outcome/constructors";
import { VariantDefinitionError } from "./errors";
import { tagsOf } from "./types";

export type RawValue = string | number;

/**
 * Bidirectional mapping between the tags of a closed set and the primitive
 * values they are stored or typed as.
 */
export interface RawValueCodec<T extends string, R extends RawValue> {
  readonly set: string;
  readonly tags: readonly T[];
  toRaw(tag: T): R;
  fromRaw(raw: unknown): Outcome<T>;
}

export function defineRawValues<T extends string, R extends RawValue>(
  set: string,
  table: { readonly [K in T]: R }
): RawValueCodec<T, R> {
  const tags = tagsOf(table);
  const byRaw = new Map<RawValue, T>();
  const errors: Diagnostic[] = [];

  for (const tag of tags) {
    const raw = table[tag];
    if (byRaw.has(raw)) {
      errors.push(makeDiagnostic("E0202", { raw }));
    }
    byRaw.set(raw, tag);
  }
  if (errors.length > 0) {
    throw new VariantDefinitionError(set, errors);
  }

  return {
    set,
    tags,
    toRaw: (tag) => table[tag],
    fromRaw: (raw) => {
      const tag = typeof raw === "string" || typeof raw === "number" ? byRaw.get(raw) : undefined;
      if (tag === undefined) {
        return invalidRawValue(set, raw);
      }
      return done(tag);
    },
  };
}
