import { makeDiagnostic } from "../outcome/codes";
import type { Diagnostic } from "../outcome/diagnostic";
import { VariantDefinitionError, type ValidationResult } from "./errors";
import { tagsOf } from "./types";

/**
 * Successor relation over a closed tag set. Every tag has exactly one successor.
 */
export interface TransitionTable<T extends string> {
  readonly name: string;
  readonly tags: readonly T[];
  next(tag: T): T;
}

export function validateTable<T extends string>(table: TransitionTable<T>): ValidationResult {
  const errors: Diagnostic[] = [];
  const known = new Set<string>(table.tags);

  for (const tag of table.tags) {
    const successor: string | undefined = table.next(tag);
    if (successor === undefined || !known.has(successor)) {
      errors.push(makeDiagnostic("E0203", { tag }));
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Table from an explicit successor map. The map's keys are the tag set, so a
 * missing entry is a compile error.
 */
export function defineTable<T extends string>(
  name: string,
  successors: { readonly [K in T]: NoInfer<T> }
): TransitionTable<T> {
  const table: TransitionTable<T> = {
    name,
    tags: tagsOf(successors),
    next: (tag) => successors[tag],
  };
  const validation = validateTable(table);
  if (!validation.valid) {
    throw new VariantDefinitionError(name, validation.errors);
  }
  return table;
}

/**
 * Table whose successor relation is the directed cycle
 * order[0] -> order[1] -> ... -> order[n-1] -> order[0].
 */
export function defineCycle<T extends string>(name: string, order: readonly [T, ...T[]]): TransitionTable<T> {
  const seen = new Set<T>();
  const errors: Diagnostic[] = [];
  for (const tag of order) {
    if (seen.has(tag)) {
      errors.push(makeDiagnostic("E0204", { tag }));
    }
    seen.add(tag);
  }
  if (errors.length > 0) {
    throw new VariantDefinitionError(name, errors);
  }

  return {
    name,
    tags: [...order],
    next: (tag) => order[(order.indexOf(tag) + 1) % order.length],
  };
}

export function stepTable<T extends string>(table: TransitionTable<T>, tag: T): T {
  return table.next(tag);
}

export function stepTableN<T extends string>(table: TransitionTable<T>, tag: T, steps: number): T {
  if (!Number.isInteger(steps) || steps < 0) {
    throw new RangeError(`steps must be a non-negative integer, got ${steps}`);
  }
  let current = tag;
  for (let i = 0; i < steps; i++) {
    current = table.next(current);
  }
  return current;
}

/**
 * True when following successors from any tag visits every tag exactly once
 * before coming back to it.
 */
export function isSimpleCycle<T extends string>(table: TransitionTable<T>): boolean {
  const [start] = table.tags;
  if (start === undefined) return false;

  const visited = new Set<T>();
  let current = start;
  for (let i = 0; i < table.tags.length; i++) {
    if (visited.has(current)) return false;
    visited.add(current);
    current = table.next(current);
  }
  return current === start && visited.size === table.tags.length;
}
