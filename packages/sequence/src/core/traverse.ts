import type { Mapper, Predicate, Sequence } from "../ports/sequence"

export function forEach<T>(sequence: Sequence<T>, fn: (value: T, index: number) => void): void {
  for (let i = 0; i < sequence.length; i++) {
    fn(sequence[i], i)
  }
}

/** New array of the same length, where `result[i] = fn(sequence[i])`. */
export function map<T, R>(sequence: Sequence<T>, fn: Mapper<T, R>): R[] {
  const result = new Array<R>(sequence.length)

  for (let i = 0; i < sequence.length; i++) {
    result[i] = fn(sequence[i])
  }

  return result
}

/**
 * Elements satisfying `predicate`, in their original order.
 * Returns an empty array (never undefined) when nothing matches.
 */
export function filter<T>(sequence: Sequence<T>, predicate: Predicate<T>): T[] {
  const result: T[] = []

  for (let i = 0; i < sequence.length; i++) {
    const value = sequence[i]
    if (predicate(value, i)) result.push(value)
  }

  return result
}
