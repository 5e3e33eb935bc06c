import type { ChainedError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Type guard to check if a value is a ChainedError.
 *
 * Duck-typed, so errors built by another copy of this package are recognized too.
 *
 * @example
 * ```ts
 * try {
 *   // ...
 * } catch (err) {
 *   if (isChainError(err)) {
 *     console.log(err.code, err.stack)
 *   }
 * }
 * ```
 */
export function isChainError(e: unknown): e is ChainedError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "number" &&
    Number.isInteger(e.code) &&
    typeof e.stack === "string" &&
    typeof e.stackContext === "string" &&
    typeof e.setCode === "function" &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
