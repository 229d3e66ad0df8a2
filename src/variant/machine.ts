import type { Tagged } from "./types";
import { silentLogger, type Logger } from "../logging/logger";

export interface MachineDefinition<V extends Tagged, E> {
  readonly name: string;
  readonly initial: V;
  transition(current: V, event: E): V;
}

export function defineMachine<V extends Tagged, E>(definition: MachineDefinition<V, E>): MachineDefinition<V, E> {
  return definition;
}

/**
 * Fold `events` through the transition function, starting at `from`.
 */
export function run<V extends Tagged, E>(
  definition: MachineDefinition<V, E>,
  events: Iterable<E>,
  from: V = definition.initial
): V {
  let current = from;
  for (const event of events) {
    current = definition.transition(current, event);
  }
  return current;
}

/**
 * Like `run`, but returns `from` followed by the variant after each event.
 */
export function trace<V extends Tagged, E>(
  definition: MachineDefinition<V, E>,
  events: Iterable<E>,
  from: V = definition.initial
): V[] {
  const states = [from];
  let current = from;
  for (const event of events) {
    current = definition.transition(current, event);
    states.push(current);
  }
  return states;
}

export interface TransitionRecord<V extends Tagged, E> {
  step: number;
  from: V;
  to: V;
  event: E;
}

export type TransitionListener<V extends Tagged, E> = (record: TransitionRecord<V, E>) => void;

export type MachineOptions<V extends Tagged> = {
  /** Starting variant; defaults to the definition's initial variant. */
  from?: V;
  logger?: Logger;
  /** Oldest records are dropped past this many. */
  historyLimit?: number;
};

export const DEFAULT_HISTORY_LIMIT = 1000;

/**
 * Holds the current variant of a machine. Each `send` replaces the held
 * value with the one the transition returns; nothing is mutated in place.
 */
export class Machine<V extends Tagged, E> {
  private value: V;
  private step = 0;
  private readonly records: TransitionRecord<V, E>[] = [];
  private readonly listeners = new Set<TransitionListener<V, E>>();
  private readonly logger: Logger;
  private readonly historyLimit: number;

  constructor(
    public readonly definition: MachineDefinition<V, E>,
    options: MachineOptions<V> = {}
  ) {
    this.value = options.from ?? definition.initial;
    this.logger = (options.logger ?? silentLogger).child(definition.name);
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  get current(): V {
    return this.value;
  }

  get history(): readonly TransitionRecord<V, E>[] {
    return this.records;
  }

  send(event: E): V {
    const from = this.value;
    const to = this.definition.transition(from, event);
    const record: TransitionRecord<V, E> = { step: ++this.step, from, to, event };

    this.value = to;
    this.records.push(record);
    if (this.records.length > this.historyLimit) {
      this.records.splice(0, this.records.length - this.historyLimit);
    }

    this.logger.debug(`${from.tag} -> ${to.tag}`, { step: record.step });
    for (const listener of this.listeners) {
      listener(record);
    }
    return to;
  }

  sendAll(events: Iterable<E>): V {
    for (const event of events) {
      this.send(event);
    }
    return this.value;
  }

  subscribe(listener: TransitionListener<V, E>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  reset(to: V = this.definition.initial): void {
    this.value = to;
    this.step = 0;
    this.records.length = 0;
    this.logger.debug(`reset to ${to.tag}`);
  }
}
