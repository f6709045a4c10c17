export * from "./types.js";
export * from "./errors.js";
export * from "./extract.js";
export * from "./fetchRegistry.js";
export * from "./clinicaltrials.js";
export * from "./cache.js";
export * from "./config.js";
