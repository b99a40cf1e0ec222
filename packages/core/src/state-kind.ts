import { InvalidIdentifierKindError, InvalidStateKindError } from "./errors.js";
import type { MachineId, State } from "./types.js";

/**
 * Checks that a value can be used as a state or machine id.
 *
 * Strings and finite numbers qualify. NaN never equals itself, and
 * neither NaN nor Infinity survives JSON encoding in remote stores.
 */
function isScalarKey(value: unknown): value is string | number {
  if (typeof value === "string") return true;
  return typeof value === "number" && Number.isFinite(value);
}

export function isState(value: unknown): value is State {
  return isScalarKey(value);
}

export function isMachineId(value: unknown): value is MachineId {
  return isScalarKey(value);
}

/**
 * `undefined` and `null` both mean "no state yet".
 */
export function isAbsentState(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

export function assertState(value: unknown): asserts value is State {
  if (!isState(value)) {
    throw new InvalidStateKindError(value);
  }
}

export function assertMachineId(value: unknown): asserts value is MachineId {
  if (!isMachineId(value)) {
    throw new InvalidIdentifierKindError(value);
  }
}
