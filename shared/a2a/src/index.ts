export * from "./types.js";
export * from "./normalize.js";
export * from "./request.js";
export * from "./client.js";
