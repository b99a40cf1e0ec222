export * from "./http-adapter.js";
export * from "./memory-adapter.js";
export * from "./redis-adapter.js";
