/**
 * Finite state machines with per-state handler registration
 *
 * StateEngine dispatches a caller-supplied state to its handler.
 * IntegratedStateEngine keeps each machine's state in a pluggable
 * StateStore keyed by machine id.
 */

// Errors
export * from "./errors.js";
// Call-scoped handler context
export * from "./execution-context.js";
// Handler bindings
export * from "./handler-table.js";
// Managed engine
export * from "./integrated-state-engine.js";
// In-memory store
export * from "./memory-state-store.js";
// Unmanaged engine
export * from "./state-engine.js";
// Value validation
export * from "./state-kind.js";
// Store interface
export * from "./state-store.js";
export * from "./types.js";
