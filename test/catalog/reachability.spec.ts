import { describe, it, expect } from "vitest";
import {
  CONNECTION_TYPES,
  NetworkReachabilityStatus,
  ReachabilityEvent,
  describeReachability,
  isReachable,
  isReachableOnEthernetOrWiFi,
  isReachableOnWwan,
  parseReachability,
  parseReachabilityEvent,
  reachabilityMachine,
  reachabilityTransition,
} from "../../src/catalog/reachability";
import { trace } from "../../src/variant/machine";
import { formatTrace } from "../../src/variant/format";
import { payloadOf } from "../../src/variant/match";
import { isDone, isFail } from "../../src/outcome/outcome";

const { Unknown, NotReachable, reachable } = NetworkReachabilityStatus;
const all = [Unknown, NotReachable, reachable("EthernetOrWiFi"), reachable("Wwan")];

describe("NetworkReachabilityStatus", () => {
  it("starts Unknown and follows link events", () => {
    const states = trace(reachabilityMachine, [
      ReachabilityEvent.linkUp("Wwan"),
      ReachabilityEvent.linkUp("EthernetOrWiFi"),
      ReachabilityEvent.LinkDown,
      ReachabilityEvent.Reset,
    ]);
    expect(formatTrace(states)).toBe(
      "Unknown -> Reachable(Wwan) -> Reachable(EthernetOrWiFi) -> NotReachable -> Unknown"
    );
  });

  it("keeps the same value when the link comes up on the connection it already has", () => {
    const current = reachable("Wwan");
    expect(reachabilityTransition(current, ReachabilityEvent.linkUp("Wwan"))).toBe(current);
  });

  it("carries the connection type as payload", () => {
    expect(payloadOf(reachable("EthernetOrWiFi"))).toBe("EthernetOrWiFi");
    expect(payloadOf(NotReachable)).toBeUndefined();
  });

  it("describes every status", () => {
    expect(all.map(describeReachability)).toEqual([
      "unknown",
      "not reachable",
      "reachable via ethernetOrWiFi",
      "reachable via wwan",
    ]);
  });

  it("derives capability flags", () => {
    expect(all.map(isReachable)).toEqual([false, false, true, true]);
    expect(all.map(isReachableOnWwan)).toEqual([false, false, false, true]);
    expect(all.map(isReachableOnEthernetOrWiFi)).toEqual([false, false, true, false]);
  });

  it("maps connection types to raw values", () => {
    expect(CONNECTION_TYPES.toRaw("Wwan")).toBe("wwan");
    const parsed = CONNECTION_TYPES.fromRaw("ethernetOrWiFi");
    expect(isDone(parsed) && parsed.value).toBe("EthernetOrWiFi");
  });
});

describe("parseReachability", () => {
  it("parses every status", () => {
    const parsed = ["unknown", "notReachable", "reachable:ethernetOrWiFi", "reachable:wwan"].map(parseReachability);
    expect(parsed.map(p => (isDone(p) ? p.value : null))).toEqual(all);
  });

  it("rejects unknown statuses and connections", () => {
    for (const text of ["offline", "reachable", "reachable:bluetooth", "unknown:wwan"]) {
      const parsed = parseReachability(text);
      expect(isFail(parsed) && parsed.failure.reason).toBe("invalid-transition");
    }
  });
});

describe("parseReachabilityEvent", () => {
  it("parses link events", () => {
    const up = parseReachabilityEvent("linkUp:wwan");
    expect(isDone(up) && up.value).toEqual(ReachabilityEvent.linkUp("Wwan"));
    const down = parseReachabilityEvent("linkDown");
    expect(isDone(down) && down.value).toEqual(ReachabilityEvent.LinkDown);
  });

  it("reports unknown events", () => {
    const parsed = parseReachabilityEvent("linkUp:carrierPigeon");
    expect(isFail(parsed) && parsed.failure.message).toBe("Unknown event for ReachabilityEvent: linkUp:carrierPigeon");
  });
});
