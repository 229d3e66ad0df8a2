// src/index.ts
// Public API of variant-state
//
// Example:
//   import { classifyInt, triStateMachine, trace, toggle } from "variant-state";
//   classifyInt(34645).tag;                              // "Medium"
//   trace(triStateMachine, [toggle, toggle]).map(s => s.tag); // ["Off", "Low", "High"]

export * from "./outcome";
export * from "./variant";
export * from "./catalog";
export * from "./config";
export * from "./logging";
