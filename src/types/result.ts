/**
 * Explicit success/failure outcome returned by every validating factory.
 */

import { MailCodecError, NullInputError } from './errors.js';

export type Result<T, E extends MailCodecError = MailCodecError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E extends MailCodecError>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Returns the carried value, or throws the carried error.
 *
 * For callers that prefer exceptions (the CLI, tests).
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Collects a list of outcomes; the first failure wins.
 */
export function all<T>(results: readonly Result<T>[]): Result<T[]> {
  const values: T[] = [];
  for (const result of results) {
    if (!result.ok) return result;
    values.push(result.value);
  }
  return ok(values);
}

export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Fails with NullInputError naming the first absent argument.
 */
export function requirePresent(args: Record<string, unknown>): Result<void> {
  for (const [name, value] of Object.entries(args)) {
    if (isAbsent(value)) {
      return err(new NullInputError(name));
    }
  }
  return ok(undefined);
}
