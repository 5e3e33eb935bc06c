import { DEFAULT_ERROR_CODE, type SerializedError } from "../ports/error"
import { errorChain } from "./utils/error-chain"
import { isChainError } from "./utils/is-chain-error"

/**
 * Options for error serialization.
 */
export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

function serializeLink(
  err: unknown,
  cause: SerializedError | undefined,
  includeStack: boolean,
): SerializedError {
  if (isChainError(err)) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      ...(cause ? { cause } : {}),
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
      ...(includeStack && err.stackContext ? { stackContext: err.stackContext } : {}),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: DEFAULT_ERROR_CODE,
      message: err.message,
      ...(cause ? { cause } : {}),
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    }
  }

  return {
    name: "NonErrorThrown",
    code: DEFAULT_ERROR_CODE,
    message: typeof err === "string" ? err : "Unknown error",
    ...(typeof err === "string" ? {} : { value: err }),
  }
}

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * Handles:
 * - ChainedError instances (preserves code, stack context, etc.)
 * - Standard Error instances (code defaults to DEFAULT_ERROR_CODE)
 * - Non-Error thrown values (kept under `value`)
 *
 * The cause chain is followed through {@link errorChain}, so cycles and overly
 * deep chains are cut off instead of recursing forever.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false
  const chain = errorChain(err)

  if (chain.length === 0) return serializeLink(err, undefined, includeStack)

  let serialized = serializeLink(chain[chain.length - 1], undefined, includeStack)

  for (let i = chain.length - 2; i >= 0; i--) {
    serialized = serializeLink(chain[i], serialized, includeStack)
  }

  return serialized
}
