import type { Outcome } from "../outcome/outcome";
import { isFail } from "../outcome/outcome";
import { done, invalidTransition } from "../outcome/constructors";
import { defineMachine, type MachineDefinition } from "../variant/machine";
import { match } from "../variant/match";
import { defineRawValues } from "../variant/rawValues";
import { defineCycle, stepTable } from "../variant/transition";
import { variant, type Unit } from "../variant/types";

export type TriStateSwitch = Unit<"Off"> | Unit<"Low"> | Unit<"High">;
export type TriStateTag = TriStateSwitch["tag"];

export const TriStateSwitch = {
  Off: variant("Off"),
  Low: variant("Low"),
  High: variant("High"),
} as const;

/** The switch only knows one event: flip to the next position. */
export type TriStateEvent = Unit<"Toggle">;

export const toggle: TriStateEvent = variant("Toggle");

export const TRI_STATE_CYCLE = defineCycle<TriStateTag>("TriStateSwitch", ["Off", "Low", "High"]);

export const TRI_STATE_RAW_VALUES = defineRawValues("TriStateSwitch", {
  Off: "off",
  Low: "low",
  High: "high",
});

export function triStateTransition(current: TriStateSwitch, _event?: TriStateEvent): TriStateSwitch {
  return variant(stepTable(TRI_STATE_CYCLE, current.tag));
}

export const triStateMachine: MachineDefinition<TriStateSwitch, TriStateEvent> = defineMachine({
  name: "TriStateSwitch",
  initial: TriStateSwitch.Off,
  transition: triStateTransition,
});

export function describeTriState(value: TriStateSwitch): string {
  switch (value.tag) {
    case "Off":
      return "off";
    case "Low":
      return "low";
    case "High":
      return "high";
  }
}

export function isOn(value: TriStateSwitch): boolean {
  return match(value, {
    Off: () => false,
    Low: () => true,
    High: () => true,
  });
}

export function parseTriStateSwitch(text: string): Outcome<TriStateSwitch> {
  const tag = TRI_STATE_RAW_VALUES.fromRaw(text);
  if (isFail(tag)) {
    return invalidTransition("TriStateSwitch", text);
  }
  return done<TriStateSwitch>(variant(tag.value));
}
