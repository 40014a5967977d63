/**
 * Typed operation results
 *
 * Facade operations never throw for expected failures; they return a Result
 * whose error carries an enumerated `kind`.
 */

import { TableDBError } from "./errors.js";

export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E extends TableDBError = TableDBError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E extends TableDBError>(error: E): Err<E> {
  return { ok: false, error };
}

export function isErr<T, E extends TableDBError>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/**
 * Return the value or throw the carried error.
 * Intended for transaction bodies, where a throw triggers rollback.
 */
export function unwrap<T, E extends TableDBError>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Run `fn`, converting a thrown TableDBError into an error result.
 * Anything else is re-thrown.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (error) {
    if (error instanceof TableDBError) {
      return err(error);
    }
    throw error;
  }
}
