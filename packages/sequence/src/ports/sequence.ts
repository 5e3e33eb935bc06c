/**
 * Any ordered, indexable, length-queryable collection: arrays, typed arrays,
 * strings, `arguments`, array-like DOM collections.
 */
export type Sequence<T> = ArrayLike<T>

export type Predicate<T> = (value: T, index: number) => boolean

/** Called with the element only, so `map(strings, parseInt)` parses in base 10. */
export type Mapper<T, R> = (value: T) => R

export type Found<T> = {
  readonly kind: "found"
  readonly index: number
  readonly value: T
}

export type NotFound = {
  readonly kind: "not_found"
}

/**
 * Result of a search over a sequence.
 *
 * @remarks
 * A miss is a normal outcome, not an error.
 */
export type FindResult<T> = Found<T> | NotFound
