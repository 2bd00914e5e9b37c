/***
 * Result - Recoverable outcomes as plain values.
 *
 * Operations whose failure the caller is expected to handle return a
 * Result instead of throwing. Narrow on `ok`:
 *
 *   const res = Player.update(player, world, entity);
 *   if (!res.ok) report(res.error);
 *
 ***/

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/** Shared success value for Result<void, E>. */
export const OK_VOID: Ok<void> = Object.freeze({ ok: true, value: undefined });
