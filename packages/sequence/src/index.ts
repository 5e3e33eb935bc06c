export { asList, fromList, toList } from "./core/convert"
export { LinkedList, type ListNode } from "./core/linked-list"
export { exists, find, findLast, indexOf, lastIndexOf } from "./core/search"
export { filter, forEach, map } from "./core/traverse"
export type {
  FindResult,
  Found,
  Mapper,
  NotFound,
  Predicate,
  Sequence,
} from "./ports/sequence"
