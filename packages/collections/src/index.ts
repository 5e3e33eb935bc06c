export { createSet, createSetFrom, HashSet } from "./core/hash-set"
export type { MutableSet, ReadableSet } from "./ports/mutable-set"
