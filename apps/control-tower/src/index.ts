export * from "./broadcaster.js";
export * from "./config.js";
export * from "./payload.js";
export * from "./progress.js";
export * from "./run-registry.js";
export * from "./server.js";
export * from "./workflow.js";
export * from "./workflow-parsers.js";
