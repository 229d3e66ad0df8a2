import { makeDiagnostic } from "../outcome/codes";
import type { Diagnostic } from "../outcome/diagnostic";
import { VariantDefinitionError, type ValidationResult } from "./errors";

/**
 * Inputs in `[from, until)` classify as `variant`.
 */
export interface RangeRule<V> {
  readonly from: number;
  readonly until: number;
  readonly variant: V;
}

export interface Classifier<V> {
  (input: number): V;
  readonly label: string;
  readonly rules: readonly RangeRule<V>[];
  readonly fallback: V;
}

export function formatRange(rule: { from: number; until: number }): string {
  return `[${rule.from}, ${rule.until})`;
}

/**
 * Rules must be non-empty intervals listed in ascending order without overlap.
 */
export function validateRanges<V>(rules: readonly RangeRule<V>[]): ValidationResult {
  const errors: Diagnostic[] = [];

  rules.forEach((rule, i) => {
    if (!(rule.from < rule.until)) {
      errors.push(makeDiagnostic("E0201", { range: formatRange(rule) }));
    }
    const previous = rules[i - 1];
    if (previous && rule.from < previous.until) {
      errors.push(makeDiagnostic("E0200", { first: formatRange(previous), second: formatRange(rule) }));
    }
  });

  return { valid: errors.length === 0, errors };
}

export function defineClassifier<V>(
  name: string,
  rules: readonly RangeRule<V>[],
  fallback: V
): Classifier<V> {
  const validation = validateRanges(rules);
  if (!validation.valid) {
    throw new VariantDefinitionError(name, validation.errors);
  }

  const ordered = [...rules];
  const classify = (input: number): V => {
    for (const rule of ordered) {
      if (input >= rule.from && input < rule.until) {
        return rule.variant;
      }
    }
    return fallback;
  };

  return Object.assign(classify, { label: name, rules: ordered, fallback });
}
