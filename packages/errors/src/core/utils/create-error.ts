import { format } from "node:util"
import type { ErrorCode } from "../../ports/error"
import { ChainError } from "../chain-error"

// Each factory constructs the error itself, so the constructor is always
// exactly one frame below the caller: skipFrames 1 hides the factory.

/**
 * Factory function to create a ChainError with less boilerplate.
 *
 * @example
 * ```ts
 * throw createError("No user with that ID")
 * ```
 */
export function createError(message: string): ChainError {
  return new ChainError(message, { skipFrames: 1 })
}

export function createErrorWithCode(code: ErrorCode, message: string): ChainError {
  return new ChainError(message, { code, skipFrames: 1 })
}

/**
 * Same as {@link createError}, with a printf-style message (`%s`, `%d`, `%j`, `%o`, ...).
 *
 * @example
 * ```ts
 * throw createErrorf("user %s not found in %d shards", userId, shards)
 * ```
 */
export function createErrorf(template: string, ...args: unknown[]): ChainError {
  return new ChainError(format(template, ...args), { skipFrames: 1 })
}

export function createErrorfWithCode(
  code: ErrorCode,
  template: string,
  ...args: unknown[]
): ChainError {
  return new ChainError(format(template, ...args), { code, skipFrames: 1 })
}

/**
 * Wraps `cause` in a new ChainError that carries its own message and stack.
 *
 * @example
 * ```ts
 * catch (err) {
 *   if (err instanceof Error) throw wrapError(err, "loading profile failed")
 * }
 * ```
 */
export function wrapError(cause: Error, message: string): ChainError {
  return new ChainError(message, { cause, skipFrames: 1 })
}

export function wrapErrorWithCode(code: ErrorCode, cause: Error, message: string): ChainError {
  return new ChainError(message, { code, cause, skipFrames: 1 })
}

export function wrapErrorf(cause: Error, template: string, ...args: unknown[]): ChainError {
  return new ChainError(format(template, ...args), { cause, skipFrames: 1 })
}

export function wrapErrorfWithCode(
  code: ErrorCode,
  cause: Error,
  template: string,
  ...args: unknown[]
): ChainError {
  return new ChainError(format(template, ...args), { code, cause, skipFrames: 1 })
}
