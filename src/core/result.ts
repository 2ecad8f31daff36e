/**
 * Result type for settlement operations
 *
 * Aborts and recoverable failures come back as an Err instead of a throw,
 * so every call site decides whether to propagate or compensate.
 */

import type { SettlementError } from '../errors.js';

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

export interface Err<E> {
  readonly ok: false;
  readonly value?: never;
  readonly error: E;
}

export type Result<T, E = SettlementError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Settle a capability call into a Result; a rejection becomes an Err
 */
export async function fromPromise<T, E>(
  promise: Promise<T>,
  mapError: (error: unknown) => E
): Promise<Result<T, E>> {
  try {
    return ok(await promise);
  } catch (error) {
    return err(mapError(error));
  }
}
