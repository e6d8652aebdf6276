/**
 * @module utils/result
 * @fileoverview Minimal success/failure channel for best-effort boundaries.
 *
 * Store writes and per-user sub-fetches report failure through a value
 * instead of an exception, so "continue with degraded data" stays an explicit
 * branch in the caller.
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
