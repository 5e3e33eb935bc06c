import { createError, wrapError } from "@tessera/errors"
import type { LogLevelName } from "../../../ports/log-level"
import { ConsoleLogger, createConsoleLogger } from "../console-logger"

const FIXED_NOW = new Date("2026-01-02T03:04:05.000Z")

describe("ConsoleLogger behavior", () => {
  function makeLineCaptureConsole() {
    const lines: string[] = []
    const calls: { method: LogLevelName; line: string }[] = []

    const capture = (method: LogLevelName) => (line: unknown) => {
      const text = String(line)

      lines.push(text)
      calls.push({ method, line: text })
    }

    const fakeConsole = {
      trace: capture("trace"),
      debug: capture("debug"),
      info: capture("info"),
      warn: capture("warn"),
      error: capture("error"),
    }

    return { lines, calls, fakeConsole }
  }

  function parse(line: string | undefined): Record<string, unknown> {
    return JSON.parse(line ?? "null")
  }

  it("defaults to the global console when no override is provided", () => {
    const spy = vi.spyOn(globalThis.console, "info").mockImplementation(() => {})

    try {
      const logger = new ConsoleLogger({}, { level: "trace" }, { requestId: "r-1" })

      logger.info("hello")

      expect(spy).toHaveBeenCalledTimes(1)
      expect(parse(String(spy.mock.calls[0]?.[0]))).toMatchObject({
        level: "info",
        message: "hello",
        requestId: "r-1",
      })
    } finally {
      spy.mockRestore()
    }
  })

  it("emits parseable JSON when prettify is false", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole, now: () => FIXED_NOW },
      { level: "trace", prettify: false },
      { requestId: "r-1" },
    )

    logger.info("hello", { tenant: "t-1" })

    expect(lines).toEqual([
      '{"timestamp":"2026-01-02T03:04:05.000Z","level":"info","message":"hello","requestId":"r-1","tenant":"t-1"}',
    ])
  })

  it("prettify true emits a human-readable line", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole, now: () => FIXED_NOW },
      { level: "trace", prettify: true },
      { requestId: "r-1" },
    )

    logger.warn("hello")

    expect(lines).toEqual(['2026-01-02T03:04:05.000Z WARN hello {"requestId":"r-1"}'])
  })

  it("pretty output of an error chain lists every message and the origin stack", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole, now: () => FIXED_NOW },
      { level: "trace", prettify: true },
    )

    const inner = createError("disk full")
    logger.error("save failed", { err: wrapError(inner, "saving report") })

    const rendered = (lines[0] ?? "").split("\n")

    expect(rendered.slice(0, 6)).toEqual([
      '2026-01-02T03:04:05.000Z ERROR save failed {"err":{"name":"ChainError","code":-1,"message":"saving report","cause":{"name":"ChainError","code":-1,"message":"disk full"}}}',
      "  ERROR:",
      "  saving report",
      "  disk full",
      "  ",
      "  ORIGINAL STACK TRACE:",
    ])
    expect(rendered[6]).toBe(`  ${inner.stack.split("\n")[0]}`)
  })

  it("pretty output of a plain error appends its stack", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole, now: () => FIXED_NOW },
      { level: "trace", prettify: true },
    )

    const err = new RangeError("out of range")
    logger.error("failed", { err })

    const rendered = (lines[0] ?? "").split("\n")

    expect(rendered[0]).toBe(
      '2026-01-02T03:04:05.000Z ERROR failed {"err":{"name":"RangeError","code":-1,"message":"out of range"}}',
    )
    expect(rendered[1]).toBe("  RangeError: out of range")
  })

  it("only emits log entries at or above the configured level", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole },
      { level: "warn", prettify: false },
    )

    logger.info("ignored")
    logger.warn("included")
    logger.error("included-too")

    expect(lines.map((l) => parse(l).level)).toEqual(["warn", "error"])
  })

  it("serializes errors through their whole cause chain", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    const cause = new Error("root")
    const err = new Error("boom", { cause })

    logger.error("failed", { err })
    logger.error("failed-again", { err: { code: "E_CUSTOM" } })

    expect(parse(lines[0]).err).toMatchObject({
      name: "Error",
      code: -1,
      message: "boom",
      cause: { name: "Error", code: -1, message: "root" },
    })
    expect(parse(lines[1]).err).toEqual({ code: "E_CUSTOM" })
  })

  it("keeps chain error codes and stacks in JSON output", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    const err = createError("quota exceeded")
    err.setCode(429)
    logger.error("rejected", { err })

    const logged = parse(lines[0]).err

    expect(logged).toMatchObject({ name: "ChainError", code: 429, message: "quota exceeded" })
    expect(logged).toHaveProperty("stack", err.stack)
  })

  it("uses the error console method for fatal", () => {
    const { calls, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    logger.fatal("boom")

    expect(calls.map((c) => c.method)).toEqual(["error"])
  })

  it("does not throw when log metadata cannot be serialized", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    const circular: Record<string, unknown> = { a: 1 }
    circular.self = circular

    logger.info("circular", { circular })

    expect(lines).toEqual(['{"message":"Failed to stringify log payload"}'])
  })

  it("preserves null error values without modification", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    logger.error("null-error", { err: null })

    expect(lines).toHaveLength(1)
    expect(parse(lines[0]).err).toBeNull()
  })

  it("emits trace and debug entries with the expected levels and methods", () => {
    const { calls, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    logger.trace("t")
    logger.debug("d")

    expect(calls.map((c) => c.method)).toEqual(["trace", "debug"])
    expect(calls.map((c) => parse(c.line).message)).toEqual(["t", "d"])
  })

  it("defaults to info level when no minimum level is configured", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = createConsoleLogger({ console: fakeConsole })

    logger.debug("ignored")
    logger.info("included")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({ level: "info", message: "included" })
  })

  it("ignores metadata fields that collide with reserved keys", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger(
      { console: fakeConsole, now: () => FIXED_NOW },
      { level: "trace", prettify: true },
    )

    logger.info("test-message", {
      timestamp: 123,
      level: 456,
      message: "SHOULD_NOT_APPEAR",
    })

    expect(lines).toEqual(["2026-01-02T03:04:05.000Z INFO test-message"])
  })

  it("drops undefined metadata fields", () => {
    const { lines, fakeConsole } = makeLineCaptureConsole()

    const logger = new ConsoleLogger({ console: fakeConsole }, { level: "trace" })

    logger.info("hello", { a: undefined, b: 1 })

    const payload = parse(lines[0])

    expect(payload).toMatchObject({ level: "info", message: "hello", b: 1 })
    expect(Object.hasOwn(payload, "a")).toBe(false)
  })
})
