/**
 * Result<T, E> Type for Functional Error Handling
 *
 * Every client operation that can fail resolves to a Result instead of
 * throwing, so the error kind is part of the signature.
 */

import type { NuclosError } from './errors.js';

// ============================================================================
// Result Type Definition
// ============================================================================

export type Result<T, E = NuclosError> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

// ============================================================================
// Constructor Functions
// ============================================================================

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok === true;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.ok === false;
}

// ============================================================================
// Extraction Functions
// ============================================================================

/**
 * Returns the value or throws the error.
 *
 * @throws {E} The error if result is Err
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error;
}

export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return isOk(result) ? result.value : defaultValue;
}

