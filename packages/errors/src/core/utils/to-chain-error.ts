import { format } from "node:util"
import { type ChainedError, DEFAULT_ERROR_CODE, type ErrorCode } from "../../ports/error"
import { ChainError } from "../chain-error"
import { isChainError } from "./is-chain-error"

/**
 * Convert any thrown value to a ChainedError.
 *
 * - ChainedError passes through unchanged
 * - Error instances become the cause of a wrapper named after their type, so
 *   the original message appears once in the chain
 * - Strings become the message
 * - Anything else is inspected into the message
 *
 * @param err - The caught value
 * @param fallbackCode - Code to use if not already a ChainedError. Default: DEFAULT_ERROR_CODE
 */
export function toChainError(
  err: unknown,
  fallbackCode: ErrorCode = DEFAULT_ERROR_CODE,
): ChainedError {
  if (isChainError(err)) {
    return err
  }

  if (err instanceof Error) {
    return new ChainError(format("Unexpected %s", err.name), {
      code: fallbackCode,
      cause: err,
      skipFrames: 1,
    })
  }

  if (typeof err === "string") {
    return new ChainError(err, { code: fallbackCode, skipFrames: 1 })
  }

  return new ChainError(format("Non-error value: %O", err), {
    code: fallbackCode,
    skipFrames: 1,
  })
}
