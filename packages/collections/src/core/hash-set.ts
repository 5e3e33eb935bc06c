import type { MutableSet, ReadableSet } from "../ports/mutable-set"

export class HashSet<T> implements MutableSet<T> {
  private elements: Set<T>

  constructor(elements: Iterable<T> = []) {
    this.elements = new Set(elements)
  }

  size(): number {
    return this.elements.size
  }

  isEmpty(): boolean {
    return this.size() === 0
  }

  contains(value: T): boolean {
    return this.elements.has(value)
  }

  toArray(): T[] {
    return [...this.elements]
  }

  add(value: T): boolean {
    const had = this.elements.has(value)

    this.elements.add(value)

    return had
  }

  remove(value: T): boolean {
    return this.elements.delete(value)
  }

  clear(): void {
    this.elements = new Set()
  }

  union(other: ReadableSet<T> | null | undefined): void {
    if (other == null) return

    other.forEach((value) => {
      this.elements.add(value)
    })
  }

  intersect(other: ReadableSet<T> | null | undefined): void {
    if (other == null) return

    for (const value of this.elements) {
      if (!other.contains(value)) this.elements.delete(value)
    }
  }

  subtract(other: ReadableSet<T> | null | undefined): void {
    if (other == null) return

    for (const value of other.toArray()) {
      this.elements.delete(value)
    }
  }

  isSubset(other: ReadableSet<T> | null | undefined): boolean {
    if (other == null || this.size() > other.size()) return false

    for (const value of this.elements) {
      if (!other.contains(value)) return false
    }

    return true
  }

  isEqual(other: ReadableSet<T> | null | undefined): boolean {
    if (other == null || this.size() !== other.size()) return false

    return this.isSubset(other)
  }

  clone(): MutableSet<T> {
    return new HashSet(this.elements)
  }

  forEach(fn: (value: T) => void): void {
    for (const value of this.elements) {
      fn(value)
    }
  }

  map<U>(fn: (value: T) => U): MutableSet<U> {
    const result = new HashSet<U>()

    for (const value of this.elements) {
      result.add(fn(value))
    }

    return result
  }

  filter(fn: (value: T) => boolean): MutableSet<T> {
    const result = new HashSet<T>()

    for (const value of this.elements) {
      if (fn(value)) result.add(value)
    }

    return result
  }

  [Symbol.iterator](): Iterator<T> {
    return this.elements.values()
  }
}

/**
 * Creates a set holding `elements`; duplicates collapse.
 *
 * @example
 * ```ts
 * const seen = createSet(1, 2, 3)
 * seen.union(createSet(2, 3, 4)) // seen now holds 1, 2, 3, 4
 * ```
 */
export function createSet<T>(...elements: T[]): MutableSet<T> {
  return new HashSet(elements)
}

export function createSetFrom<T>(elements: Iterable<T>): MutableSet<T> {
  return new HashSet(elements)
}
