/**
 * Discriminated union for operations that can fail on ordinary input.
 *
 * Check `result.ok` to narrow:
 *
 * ```ts
 * const result = FullDate.parse(header);
 * if (!result.ok) return result.error;
 * const date = result.value;
 * ```
 */
export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Success<T> | Failure<E>;

export function succeed<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail<E>(error: E): Failure<E> {
  return { ok: false, error };
}
