import type { Sequence } from "../ports/sequence"
import { LinkedList } from "./linked-list"

/**
 * Builds a list holding `elements` in argument order.
 *
 * @example
 * ```ts
 * asList(1, 2, 3).toArray() // [1, 2, 3]
 * ```
 */
export function asList<T>(...elements: T[]): LinkedList<T> {
  return toList(elements)
}

/** Copies the elements of `sequence` into a new list, preserving order. */
export function toList<T>(sequence: Sequence<T>): LinkedList<T> {
  const list = new LinkedList<T>()

  for (let i = 0; i < sequence.length; i++) {
    list.pushBack(sequence[i])
  }

  return list
}

/**
 * Copies the elements of `list` into a new array in forward order.
 * An absent or empty list yields an empty array.
 */
export function fromList<T>(list: LinkedList<T> | null | undefined): T[] {
  if (list == null) return []

  return list.toArray()
}
