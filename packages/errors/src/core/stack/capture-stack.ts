import type { CapturedStack } from "../../ports/error"
import { getErrorsConfig } from "../config"

const FRAME_LINE = /^\s+at\s/

function isFrame(line: string): boolean {
  return FRAME_LINE.test(line)
}

/**
 * Splits a V8-style stack dump into the stack proper and its trailing context.
 *
 * The header (every line before the first frame) is kept, the next `skip`
 * frames are dropped, and frames are then consumed until the first line that
 * is not a frame. Everything from that line on is the context.
 *
 * @example
 * ```ts
 * splitStack("Error: boom\n    at a (a.ts:1:1)\n    at b (b.ts:1:1)", 1)
 * // { stack: "Error: boom\n    at b (b.ts:1:1)", context: "" }
 * ```
 */
export function splitStack(raw: string, skip: number): CapturedStack {
  const lines = raw.split("\n")
  const firstFrame = lines.findIndex(isFrame)

  if (firstFrame === -1) return { stack: raw, context: "" }

  const header = lines.slice(0, firstFrame)

  let index = firstFrame
  let skipped = 0

  while (skipped < skip && index < lines.length && isFrame(lines[index])) {
    index++
    skipped++
  }

  const start = index

  while (index < lines.length && isFrame(lines[index])) {
    index++
  }

  return {
    stack: [...header, ...lines.slice(start, index)].join("\n"),
    context: lines.slice(index).join("\n"),
  }
}

/** Function whose own frame and everything above it are left out of a capture. */
export type StackBoundary = NonNullable<Parameters<ErrorConstructor["captureStackTrace"]>[1]>

/**
 * Records the current call stack on `target` and splits it with {@link splitStack}.
 *
 * Frames down to and including the innermost call of `boundary` (by default
 * `captureStack` itself) are never recorded, so the first frame is the
 * caller of `boundary`; `skip` drops that many more. The header line is built
 * from `target`'s name and message, so set those first.
 */
export function captureStack(
  target: object,
  skip: number,
  frameLimit: number = getErrorsConfig().stackFrameLimit,
  boundary: StackBoundary = captureStack,
): CapturedStack {
  if (!Number.isInteger(skip) || skip < 0) {
    throw new RangeError(`skip must be a non-negative integer (got ${skip})`)
  }

  const previousLimit = Error.stackTraceLimit
  Error.stackTraceLimit = frameLimit + skip

  try {
    Error.captureStackTrace(target, boundary)
  } finally {
    Error.stackTraceLimit = previousLimit
  }

  const raw = "stack" in target && typeof target.stack === "string" ? target.stack : ""

  return splitStack(raw, skip)
}

/**
 * Returns the current stack as seen by the caller: the first frame is the
 * function that called `stackTrace`.
 */
export function stackTrace(): CapturedStack {
  return captureStack(new Error(), 1)
}
