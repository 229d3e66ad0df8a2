import { describe, it, expect } from "vitest";
import {
  TriStateSwitch,
  TRI_STATE_CYCLE,
  TRI_STATE_RAW_VALUES,
  describeTriState,
  isOn,
  parseTriStateSwitch,
  toggle,
  triStateMachine,
  triStateTransition,
} from "../../src/catalog/triStateSwitch";
import { isSimpleCycle, validateTable } from "../../src/variant/transition";
import { Machine, trace } from "../../src/variant/machine";
import { isDone, isFail } from "../../src/outcome/outcome";

const all = [TriStateSwitch.Off, TriStateSwitch.Low, TriStateSwitch.High];

describe("TriStateSwitch", () => {
  it("starts Off and cycles Off -> Low -> High -> Off", () => {
    const states = trace(triStateMachine, [toggle, toggle, toggle]);
    expect(states.map(s => s.tag)).toEqual(["Off", "Low", "High", "Off"]);
  });

  it("comes back to every state after three transitions", () => {
    for (const state of all) {
      const back = triStateTransition(triStateTransition(triStateTransition(state)));
      expect(back).toEqual(state);
    }
  });

  it("has exactly one successor per state, forming a single cycle", () => {
    expect(validateTable(TRI_STATE_CYCLE).valid).toBe(true);
    expect(isSimpleCycle(TRI_STATE_CYCLE)).toBe(true);
    expect(all.map(s => triStateTransition(s).tag)).toEqual(["Low", "High", "Off"]);
  });

  it("gives the same result with or without the toggle event", () => {
    expect(triStateTransition(TriStateSwitch.Low, toggle)).toEqual(triStateTransition(TriStateSwitch.Low));
  });

  it("describes every state", () => {
    expect(all.map(describeTriState)).toEqual(["off", "low", "high"]);
    expect(all.map(isOn)).toEqual([false, true, true]);
  });

  it("can be driven through a Machine", () => {
    const machine = new Machine(triStateMachine);
    machine.send(toggle);
    machine.send(toggle);
    expect(machine.current).toEqual(TriStateSwitch.High);
  });
});

describe("TriStateSwitch raw values", () => {
  it("maps tags to lower-case names", () => {
    expect(all.map(s => TRI_STATE_RAW_VALUES.toRaw(s.tag))).toEqual(["off", "low", "high"]);
  });

  it("parses raw names", () => {
    const parsed = parseTriStateSwitch("high");
    expect(isDone(parsed) && parsed.value).toEqual(TriStateSwitch.High);
  });

  it("reports unknown names as an invalid transition", () => {
    const parsed = parseTriStateSwitch("medium");
    expect(isFail(parsed)).toBe(true);
    if (isFail(parsed)) {
      expect(parsed.failure.reason).toBe("invalid-transition");
      expect(parsed.failure.message).toBe("Unknown variant for TriStateSwitch: medium");
    }
  });
});
