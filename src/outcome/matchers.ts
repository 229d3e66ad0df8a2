import type { Outcome, Done, Fail } from "./outcome";
import { isDone } from "./outcome";

export function matchOutcome<A, R>(
  outcome: Outcome<A>,
  handlers: {
    done: (d: Done<A>) => R;
    fail: (f: Fail) => R;
  }
): R {
  switch (outcome.tag) {
    case "Done":
      return handlers.done(outcome);
    case "Fail":
      return handlers.fail(outcome);
  }
}

export function mapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => B): Outcome<B> {
  if (isDone(o)) {
    return { ...o, value: fn(o.value) };
  }
  return o;
}

export function flatMapOutcome<A, B>(o: Outcome<A>, fn: (a: A) => Outcome<B>): Outcome<B> {
  if (isDone(o)) {
    return fn(o.value);
  }
  return o;
}

/**
 * Collect a list of outcomes into one; the first failure wins.
 */
export function sequence<A>(outcomes: readonly Outcome<A>[]): Outcome<A[]> {
  const values: A[] = [];
  for (const o of outcomes) {
    if (!isDone(o)) {
      return o;
    }
    values.push(o.value);
  }
  return { tag: "Done", value: values, meta: {} };
}

export function unwrap<A>(o: Outcome<A>): A {
  if (isDone(o)) {
    return o.value;
  }
  throw new Error(o.failure.message);
}

export function unwrapOr<A>(o: Outcome<A>, defaultValue: A): A {
  return isDone(o) ? o.value : defaultValue;
}
