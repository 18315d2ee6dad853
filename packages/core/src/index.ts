export * from "./constants.js";
export * from "./diagnostics.js";
export * from "./engine.js";
export * from "./errors.js";
export * from "./limit.js";
export * from "./limits.js";
export * from "./log.js";
export * from "./plans.js";
export * from "./types.js";
export * from "./usage.js";
