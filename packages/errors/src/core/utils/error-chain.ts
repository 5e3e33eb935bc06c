import { getErrorsConfig } from "../config"

function causeOf(link: unknown): unknown {
  if (typeof link !== "object" || link === null || !("cause" in link)) return undefined

  return link.cause
}

/**
 * Lazily yields `err` followed by each `cause` below it, outermost first.
 *
 * Stops at the first absent cause, at a value already visited (cyclic
 * chains) or after `maxDepth` links. Callers that only need a prefix of the
 * chain can break out early.
 */
export function* iterateChain(
  err: unknown,
  maxDepth: number = getErrorsConfig().maxChainDepth,
): Generator<unknown, void, undefined> {
  const visited = new WeakSet<object>()
  let depth = 0

  for (let link = err; link != null && depth < maxDepth; link = causeOf(link)) {
    if (typeof link === "object") {
      if (visited.has(link)) return
      visited.add(link)
    }

    yield link
    depth++
  }
}

/**
 * The whole cause chain as an array, outermost first.
 *
 * @example
 * ```ts
 * catch (err) {
 *   const codes = errorChain(err).filter(isChainError).map((e) => e.code)
 * }
 * ```
 */
export function errorChain(err: unknown, maxDepth?: number): unknown[] {
  return [...iterateChain(err, maxDepth)]
}
