/**
 * Read side of a collection that contains no duplicate elements.
 *
 * @remarks
 * Elements are compared with SameValueZero, the equality of the built-in `Set`:
 * primitives by value, objects by reference, `NaN` equal to itself.
 * Iteration order is unspecified.
 */
export interface ReadableSet<T> extends Iterable<T> {
  /** Number of elements (the cardinality). */
  size(): number

  isEmpty(): boolean

  contains(value: T): boolean

  /**
   * Snapshot of the elements, in no particular order.
   * The caller is free to modify the returned array.
   */
  toArray(): T[]

  /** Calls `fn` once per element, in no particular order. */
  forEach(fn: (value: T) => void): void

  /**
   * Returns true when every element of this set is in `other`.
   * Always false when `other` is absent or smaller than this set.
   */
  isSubset(other: ReadableSet<T> | null | undefined): boolean

  /**
   * Returns true when both sets hold the same elements.
   * Always false when `other` is absent or the sizes differ.
   */
  isEqual(other: ReadableSet<T> | null | undefined): boolean

  /** New set with its own storage and the same elements. */
  clone(): MutableSet<T>

  /** New set of `fn(e)` for every element; results that collide collapse. */
  map<U>(fn: (value: T) => U): MutableSet<U>

  /** New set of the elements satisfying `fn`. */
  filter(fn: (value: T) => boolean): MutableSet<T>
}

/**
 * A set that is changed in place.
 *
 * Not safe for concurrent use: callers that share one across async tasks
 * must serialize access themselves.
 */
export interface MutableSet<T> extends ReadableSet<T> {
  /**
   * Adds `value`.
   *
   * Returns true if the set ALREADY contained `value` before the call.
   */
  add(value: T): boolean

  /**
   * Removes `value`.
   *
   * Returns true if the set contained `value`.
   */
  remove(value: T): boolean

  /** Removes every element. */
  clear(): void

  /** Adds every element of `other`. No-op when `other` is absent. */
  union(other: ReadableSet<T> | null | undefined): void

  /** Removes every element not in `other`. No-op when `other` is absent. */
  intersect(other: ReadableSet<T> | null | undefined): void

  /** Removes every element that is in `other`. No-op when `other` is absent. */
  subtract(other: ReadableSet<T> | null | undefined): void
}
