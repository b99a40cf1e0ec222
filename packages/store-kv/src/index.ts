/**
 * Key-value storage backend for fsm-dispatch
 *
 * Provides a StateStore that keeps machine states in a remote key-value
 * service. Includes adapters for Redis, HTTP key-value services and
 * in-memory storage (for testing).
 */

// Adapters
export * from "./adapters/index.js";
// Client interface
export * from "./key-value-client.js";
// Store implementation
export * from "./kv-state-store.js";
