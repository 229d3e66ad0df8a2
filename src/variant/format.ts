import type { Tagged } from "./types";
import { payloadOf } from "./match";

function formatPayload(payload: unknown): string {
  if (Array.isArray(payload)) {
    return payload.map(formatPayload).join(", ");
  }
  if (typeof payload === "object" && payload !== null) {
    return JSON.stringify(payload);
  }
  return String(payload);
}

/**
 * `Tag` for variants without payload, `Tag(payload)` otherwise; tuple
 * payloads are listed comma-separated.
 */
export function formatVariant<V extends Tagged>(value: V): string {
  const payload = payloadOf(value);
  return payload === undefined ? value.tag : `${value.tag}(${formatPayload(payload)})`;
}

export function formatTrace(states: readonly Tagged[]): string {
  return states.map(formatVariant).join(" -> ");
}
