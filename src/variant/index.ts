// src/variant/index.ts
// Variant state engine exports

export {
  type Tagged,
  type TagOf,
  type VariantOf,
  type PayloadOf,
  type Unit,
  type WithPayload,
  variant,
  isVariant,
  tagsOf,
} from "./types";
export { VariantDefinitionError, type ValidationResult } from "./errors";
export { type Handlers, match, payloadOf } from "./match";
export { formatVariant, formatTrace } from "./format";
export {
  type RangeRule,
  type Classifier,
  formatRange,
  validateRanges,
  defineClassifier,
} from "./classify";
export {
  type TransitionTable,
  validateTable,
  defineTable,
  defineCycle,
  stepTable,
  stepTableN,
  isSimpleCycle,
} from "./transition";
export { type RawValue, type RawValueCodec, defineRawValues } from "./rawValues";
export {
  type MachineDefinition,
  type TransitionRecord,
  type TransitionListener,
  type MachineOptions,
  DEFAULT_HISTORY_LIMIT,
  defineMachine,
  run,
  trace,
  Machine,
} from "./machine";
