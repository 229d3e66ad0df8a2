// src/catalog/index.ts
// Ready-made variant sets

export * from "./triStateSwitch";
export * from "./intCategory";
export * from "./reachability";
export * from "./player";
export * from "./barcode";
export { splitArgument, parseInteger } from "./text";
