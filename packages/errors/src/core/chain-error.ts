import {
  type ChainedError,
  DEFAULT_ERROR_CODE,
  type ErrorCode,
  type SerializedError,
} from "../ports/error"
import { serializeError } from "./serialize-error"
import { captureStack } from "./stack/capture-stack"

export type ChainErrorOptions = Readonly<{
  /** @default DEFAULT_ERROR_CODE */
  code?: ErrorCode

  /** Error being wrapped. Held by reference, never copied. */
  cause?: Error

  /**
   * Frames to drop above the constructor when capturing the stack, so that
   * factory helpers do not show up in it.
   * @default 0
   */
  skipFrames?: number
}>

function assertErrorCode(code: ErrorCode): void {
  if (!Number.isInteger(code)) {
    throw new RangeError(`error code must be an integer (got ${code})`)
  }
}

export class ChainError extends Error implements ChainedError {
  declare stack: string
  readonly stackContext: string
  readonly inner: Error | undefined
  private currentCode: ErrorCode

  constructor(message: string, options: ChainErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    const code = options.code ?? DEFAULT_ERROR_CODE
    assertErrorCode(code)

    this.name = this.constructor.name
    this.currentCode = code
    this.inner = options.cause

    // Stops at the outermost constructor, so subclasses stay out of the stack.
    const captured = captureStack(this, options.skipFrames ?? 0, undefined, new.target)
    this.stack = captured.stack
    this.stackContext = captured.context
  }

  get code(): ErrorCode {
    return this.currentCode
  }

  setCode(code: ErrorCode): void {
    assertErrorCode(code)
    this.currentCode = code
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}
