export * from "./server.js";
export * from "./replies.js";
