export * from "./derive.js";
export * from "./filters.js";
export * from "./metrics.js";
export * from "./distributions.js";
