import type { Outcome } from "../outcome/outcome";
import { isFail } from "../outcome/outcome";
import { done, invalidTransition } from "../outcome/constructors";
import { defineMachine, type MachineDefinition } from "../variant/machine";
import { match } from "../variant/match";
import { defineRawValues } from "../variant/rawValues";
import { variant, type Unit, type WithPayload } from "../variant/types";
import { splitArgument } from "./text";

export type ConnectionType = "EthernetOrWiFi" | "Wwan";

export const CONNECTION_TYPES = defineRawValues<ConnectionType, string>("ConnectionType", {
  EthernetOrWiFi: "ethernetOrWiFi",
  Wwan: "wwan",
});

export type NetworkReachabilityStatus =
  | Unit<"Unknown">
  | Unit<"NotReachable">
  | WithPayload<"Reachable", ConnectionType>;

export const NetworkReachabilityStatus = {
  Unknown: variant("Unknown"),
  NotReachable: variant("NotReachable"),
  reachable: (connection: ConnectionType) => variant("Reachable", connection),
} as const;

export type ReachabilityEvent =
  | WithPayload<"LinkUp", ConnectionType>
  | Unit<"LinkDown">
  | Unit<"Reset">;

export const ReachabilityEvent = {
  linkUp: (connection: ConnectionType) => variant("LinkUp", connection),
  LinkDown: variant("LinkDown"),
  Reset: variant("Reset"),
} as const;

export function reachabilityTransition(
  current: NetworkReachabilityStatus,
  event: ReachabilityEvent
): NetworkReachabilityStatus {
  switch (event.tag) {
    case "LinkUp":
      if (current.tag === "Reachable" && current.payload === event.payload) {
        return current;
      }
      return NetworkReachabilityStatus.reachable(event.payload);
    case "LinkDown":
      return NetworkReachabilityStatus.NotReachable;
    case "Reset":
      return NetworkReachabilityStatus.Unknown;
  }
}

export const reachabilityMachine: MachineDefinition<NetworkReachabilityStatus, ReachabilityEvent> = defineMachine({
  name: "NetworkReachabilityStatus",
  initial: NetworkReachabilityStatus.Unknown,
  transition: reachabilityTransition,
});

export function describeReachability(status: NetworkReachabilityStatus): string {
  return match(status, {
    Unknown: () => "unknown",
    NotReachable: () => "not reachable",
    Reachable: (reachable) => `reachable via ${CONNECTION_TYPES.toRaw(reachable.payload)}`,
  });
}

export function isReachable(status: NetworkReachabilityStatus): boolean {
  return status.tag === "Reachable";
}

export function isReachableOnWwan(status: NetworkReachabilityStatus): boolean {
  return status.tag === "Reachable" && status.payload === "Wwan";
}

export function isReachableOnEthernetOrWiFi(status: NetworkReachabilityStatus): boolean {
  return status.tag === "Reachable" && status.payload === "EthernetOrWiFi";
}

function parseConnection(set: string, text: string, raw: string): Outcome<ConnectionType> {
  const connection = CONNECTION_TYPES.fromRaw(raw);
  if (isFail(connection)) {
    return invalidTransition(set, text);
  }
  return connection;
}

/**
 * `unknown`, `notReachable` or `reachable:<ethernetOrWiFi|wwan>`.
 */
export function parseReachability(text: string): Outcome<NetworkReachabilityStatus> {
  const [head, arg] = splitArgument(text);
  switch (head) {
    case "unknown":
      return arg === undefined ? done(NetworkReachabilityStatus.Unknown) : invalidTransition("NetworkReachabilityStatus", text);
    case "notReachable":
      return arg === undefined ? done(NetworkReachabilityStatus.NotReachable) : invalidTransition("NetworkReachabilityStatus", text);
    case "reachable": {
      if (arg === undefined) return invalidTransition("NetworkReachabilityStatus", text);
      const connection = parseConnection("NetworkReachabilityStatus", text, arg);
      if (isFail(connection)) return connection;
      return done(NetworkReachabilityStatus.reachable(connection.value));
    }
    default:
      return invalidTransition("NetworkReachabilityStatus", text);
  }
}

/**
 * `linkUp:<ethernetOrWiFi|wwan>`, `linkDown` or `reset`.
 */
export function parseReachabilityEvent(text: string): Outcome<ReachabilityEvent> {
  const [head, arg] = splitArgument(text);
  switch (head) {
    case "linkUp": {
      if (arg === undefined) return invalidTransition("ReachabilityEvent", text, "event");
      const connection = CONNECTION_TYPES.fromRaw(arg);
      if (isFail(connection)) return invalidTransition("ReachabilityEvent", text, "event");
      return done(ReachabilityEvent.linkUp(connection.value));
    }
    case "linkDown":
      return arg === undefined ? done(ReachabilityEvent.LinkDown) : invalidTransition("ReachabilityEvent", text, "event");
    case "reset":
      return arg === undefined ? done(ReachabilityEvent.Reset) : invalidTransition("ReachabilityEvent", text, "event");
    default:
      return invalidTransition("ReachabilityEvent", text, "event");
  }
}
