import { describe, it, expect, vi } from "vitest";
import { defineMachine, Machine, run, trace, type TransitionRecord } from "../../src/variant/machine";
import { variant, type Unit, type WithPayload } from "../../src/variant/types";
import { createLogger, type LogSink } from "../../src/logging/logger";

type Counter = Unit<"Idle"> | WithPayload<"Counting", number>;
type CounterEvent = Unit<"Tick"> | Unit<"Stop">;

const tick: CounterEvent = variant("Tick");
const stop: CounterEvent = variant("Stop");

const counter = defineMachine<Counter, CounterEvent>({
  name: "Counter",
  initial: variant("Idle"),
  transition: (current, event) => {
    if (event.tag === "Stop") return variant("Idle");
    return variant("Counting", current.tag === "Idle" ? 1 : current.payload + 1);
  },
});

function recordingSink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: (line) => lines.push(`debug ${line}`),
    info: (line) => lines.push(`info ${line}`),
    warn: (line) => lines.push(`warn ${line}`),
    error: (line) => lines.push(`error ${line}`),
  };
}

describe("run and trace", () => {
  it("folds events from the initial variant", () => {
    expect(run(counter, [tick, tick, tick])).toEqual({ tag: "Counting", payload: 3 });
    expect(run(counter, [])).toEqual({ tag: "Idle" });
  });

  it("can start elsewhere", () => {
    expect(run(counter, [tick], variant("Counting", 41))).toEqual({ tag: "Counting", payload: 42 });
  });

  it("lists every intermediate variant", () => {
    const states = trace(counter, [tick, tick, stop]);
    expect(states.map(s => s.tag)).toEqual(["Idle", "Counting", "Counting", "Idle"]);
  });

  it("does not touch the values it is given", () => {
    const start: Counter = variant("Counting", 5);
    run(counter, [tick, tick], start);
    expect(start).toEqual({ tag: "Counting", payload: 5 });
  });
});

describe("Machine", () => {
  it("rebinds the current variant on send", () => {
    const machine = new Machine(counter);
    expect(machine.current).toEqual({ tag: "Idle" });
    const before = machine.current;
    machine.send(tick);
    expect(machine.current).toEqual({ tag: "Counting", payload: 1 });
    expect(before).toEqual({ tag: "Idle" });
  });

  it("records history", () => {
    const machine = new Machine(counter);
    machine.sendAll([tick, stop]);
    expect(machine.history.map(r => [r.step, r.from.tag, r.to.tag, r.event.tag])).toEqual([
      [1, "Idle", "Counting", "Tick"],
      [2, "Counting", "Idle", "Stop"],
    ]);
  });

  it("keeps only the newest records past the history limit", () => {
    const machine = new Machine(counter, { historyLimit: 2 });
    machine.sendAll([tick, tick, tick]);
    expect(machine.history.map(r => r.step)).toEqual([2, 3]);
  });

  it("notifies subscribers until they unsubscribe", () => {
    const machine = new Machine(counter);
    const listener = vi.fn((_record: TransitionRecord<Counter, CounterEvent>) => undefined);
    const unsubscribe = machine.subscribe(listener);

    machine.send(tick);
    unsubscribe();
    machine.send(tick);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0].to).toEqual({ tag: "Counting", payload: 1 });
  });

  it("resets to the initial variant and clears history", () => {
    const machine = new Machine(counter, { from: variant("Counting", 9) });
    machine.send(tick);
    machine.reset();
    expect(machine.current).toEqual({ tag: "Idle" });
    expect(machine.history).toEqual([]);
    machine.send(tick);
    expect(machine.history[0].step).toBe(1);
  });

  it("logs transitions at debug level", () => {
    const sink = recordingSink();
    const machine = new Machine(counter, { logger: createLogger({ level: "debug", sink }) });
    machine.send(tick);
    expect(sink.lines).toEqual(['debug [Counter] Idle -> Counting {"step":1}']);
  });

  it("stays quiet above debug level", () => {
    const sink = recordingSink();
    const machine = new Machine(counter, { logger: createLogger({ level: "info", sink }) });
    machine.send(tick);
    expect(sink.lines).toEqual([]);
  });
});
