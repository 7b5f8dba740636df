/**
 * Outcome of a parse step: the parsed value, or why it was rejected.
 * `parsePuzzle` and the CLI argument parser return these instead of
 * throwing, so callers choose between reporting and rethrowing.
 */
export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export type Rejected<E> = Extract<Result<unknown, E>, { ok: false }>;

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Rejected<E> {
  return { ok: false, error };
}

export function isErr<T, E>(result: Result<T, E>): result is Rejected<E> {
  return !result.ok;
}

/** The parsed value; a rejection is thrown as is. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
