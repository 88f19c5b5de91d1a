export * from "./types.js";
export * from "./envelope.js";
export * from "./errors.js";
export * from "./metrics.js";
