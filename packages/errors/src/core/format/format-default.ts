import type { ChainedError } from "../../ports/error"
import { iterateChain } from "../utils/error-chain"
import { isChainError } from "../utils/is-chain-error"

export const NON_ERROR_MESSAGE = "Passed a non-error to chainMessage"

function plainMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value)
}

/**
 * Messages of the chain, outermost first. Stops after the first link that is
 * not a chained error, whose plain message is the last entry.
 *
 * The walk has no depth cap: rendering keeps every message, and the cycle
 * guard in {@link iterateChain} ends it.
 */
function collectMessages(err: ChainedError): { messages: string[]; originStack: string } {
  const messages: string[] = []
  let originStack = err.stack

  for (const link of iterateChain(err, Number.POSITIVE_INFINITY)) {
    if (!isChainError(link)) {
      messages.push(plainMessage(link))
      break
    }

    messages.push(link.message)
    originStack = link.stack
  }

  return { messages, originStack }
}

/**
 * Renders every message of the chain followed by the stack captured by the
 * innermost chained error.
 *
 * @example
 * ```text
 * ERROR:
 * saving order failed
 * connection refused
 *
 * ORIGINAL STACK TRACE:
 * ChainError: connection refused
 *     at connect (db.ts:10:11)
 * ```
 */
export function formatDefault(err: ChainedError): string {
  const { messages, originStack } = collectMessages(err)

  return ["ERROR:", ...messages, "", "ORIGINAL STACK TRACE:", originStack].join("\n")
}

/**
 * The error message without any stack trace.
 *
 * Chained errors yield the messages of the whole chain joined by spaces.
 */
export function chainMessage(value: unknown): string {
  if (isChainError(value)) return collectMessages(value).messages.join(" ")

  if (value instanceof Error) return value.message

  return NON_ERROR_MESSAGE
}
