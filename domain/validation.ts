/**
 * Domain validation — assertions and invariants.
 * Platform-independent.
 */

import { RepresentationError, TimeValueError, type ErrorMetadata } from "./errors.js";

/** Throws TimeValueError if condition is falsy. TypeScript narrows after a successful call. */
export function assert(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new TimeValueError(message, metadata);
  }
}

/** Same shape as assert, for invariants that must always hold. Throws RepresentationError. */
export function invariant(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new RepresentationError(message, metadata);
  }
}

/** Call in unreachable branches (e.g. exhaustive switch). Always throws. */
export function neverReached(value: never, message = "Unreachable"): never {
  throw new RepresentationError(message, { value });
}
