export type Ok<T> = {
  readonly ok: true
  readonly value: T
}

export type Err<E> = {
  readonly ok: false
  readonly error: E
}

/**
 * Outcome of an operation that reports expected failures as values.
 *
 * @remarks
 * Source accessors and constructors return this instead of throwing, so the
 * caller decides whether a closed source or a missing bundle is fatal.
 */
export type Result<T, E> = Ok<T> | Err<E>
