import type { FindResult, NotFound, Predicate, Sequence } from "../ports/sequence"

const NOT_FOUND: NotFound = Object.freeze({ kind: "not_found" as const })

/** Index of the first element satisfying `predicate`, or -1. */
export function indexOf<T>(sequence: Sequence<T>, predicate: Predicate<T>): number {
  for (let i = 0; i < sequence.length; i++) {
    if (predicate(sequence[i], i)) return i
  }

  return -1
}

/**
 * Index of the last element satisfying `predicate`, or -1.
 * Scans backward and stops at the first match; index 0 is tested too.
 */
export function lastIndexOf<T>(sequence: Sequence<T>, predicate: Predicate<T>): number {
  for (let i = sequence.length - 1; i >= 0; i--) {
    if (predicate(sequence[i], i)) return i
  }

  return -1
}

/** True if some element satisfies `predicate`. Stops at the first match. */
export function exists<T>(sequence: Sequence<T>, predicate: Predicate<T>): boolean {
  return indexOf(sequence, predicate) !== -1
}

function resultAt<T>(sequence: Sequence<T>, index: number): FindResult<T> {
  if (index === -1) return NOT_FOUND

  return { kind: "found", index, value: sequence[index] }
}

/**
 * First element satisfying `predicate`.
 *
 * @example
 * ```ts
 * const hit = find(users, (u) => u.admin)
 * if (hit.kind === "found") notify(hit.value)
 * ```
 */
export function find<T>(sequence: Sequence<T>, predicate: Predicate<T>): FindResult<T> {
  return resultAt(sequence, indexOf(sequence, predicate))
}

/** Last element satisfying `predicate`, scanning backward down to index 0. */
export function findLast<T>(sequence: Sequence<T>, predicate: Predicate<T>): FindResult<T> {
  return resultAt(sequence, lastIndexOf(sequence, predicate))
}
