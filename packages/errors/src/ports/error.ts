/**
 * Numeric error code for programmatic handling.
 * {@link DEFAULT_ERROR_CODE} marks an error created without one.
 */
export type ErrorCode = number

export const DEFAULT_ERROR_CODE: ErrorCode = -1

export interface ChainedError extends Error {
  /** Error code for programmatic handling, {@link DEFAULT_ERROR_CODE} when unspecified */
  readonly code: ErrorCode

  /**
   * Stack snapshot taken once, when the error was constructed.
   * Starts with the header line followed by the frames of the creating call site.
   */
  readonly stack: string

  /** Text that followed the stack proper in the captured trace (often empty) */
  readonly stackContext: string

  /**
   * Wrapped error, if this error wraps another one.
   *
   * The same value is exposed as the standard
   * {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}.
   */
  readonly inner?: Error

  readonly cause?: unknown

  /** Replaces the code after construction. Codes must be integers. */
  setCode(code: ErrorCode): void
}

/**
 * Stack text split at the end of the frame list.
 */
export type CapturedStack = Readonly<{
  stack: string
  context: string
}>

/**
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: ErrorCode
  message: string
  cause?: SerializedError
  stack?: string
  stackContext?: string
  value?: unknown
}>
