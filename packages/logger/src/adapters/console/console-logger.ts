import { formatDefault, isChainError, serializeError } from "@tessera/errors"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { LEVEL_SEVERITY, type LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import { LOGGER_DEFAULTS, type LoggerOptions } from "../../ports/logger-options"

type ConsoleMethod = "trace" | "debug" | "info" | "warn" | "error"

export type ConsoleWriter = Pick<Console, ConsoleMethod>

export type ConsoleLoggerDeps = {
  console?: ConsoleWriter
  /** Clock for the `timestamp` field. */
  now?: () => Date
}

const LEVEL_TO_CONSOLE_METHOD: Record<LogLevelName, ConsoleMethod> = {
  trace: "trace",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
  fatal: "error",
}

const RESERVED_KEYS = ["timestamp", "level", "message"] as const

type Entry = {
  timestamp: string
  level: LogLevelName
  message: string
  fields: Record<string, unknown>
}

export class ConsoleLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly sink: ConsoleWriter
  private readonly now: () => Date
  private readonly opts: Partial<LoggerOptions>
  private readonly context: LogContextPatch

  constructor(
    private readonly deps: ConsoleLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.sink = deps.console ?? globalThis.console
    this.now = deps.now ?? (() => new Date())
    this.opts = opts
    this.context = stripUndefined(context)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new ConsoleLogger<TContext & U>(this.deps, this.opts, {
      ...this.context,
      ...stripUndefined(context),
    })
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  private shouldLog(level: LogLevelName): boolean {
    const min = this.opts.level ?? LOGGER_DEFAULTS.level
    return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[min]
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>) {
    if (!this.shouldLog(level)) return

    const fields: Record<string, unknown> = {
      ...this.context,
      ...(meta ? stripUndefined(meta) : {}),
    }
    for (const key of RESERVED_KEYS) delete fields[key]

    const entry: Entry = { timestamp: this.now().toISOString(), level, message, fields }
    const prettify = this.opts.prettify ?? LOGGER_DEFAULTS.prettify
    const output = prettify ? formatPretty(entry) : formatJson(entry)

    this.sink[LEVEL_TO_CONSOLE_METHOD[level]](output)
  }
}

function isErrorLike(value: unknown): boolean {
  return value instanceof Error || isChainError(value)
}

/**
 * Errors become their serialized chain (codes, messages, stacks); any other
 * `err` value is logged as given.
 */
function normalizeError(err: unknown): unknown {
  return isErrorLike(err) ? serializeError(err, { includeStack: true }) : err
}

function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }
  return out
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    return JSON.stringify({ message: "Failed to stringify log payload" })
  }
}

function formatJson({ timestamp, level, message, fields }: Entry): string {
  const payload: Record<string, unknown> = { timestamp, level, message, ...fields }

  if ("err" in fields) payload.err = normalizeError(fields.err)

  return safeStringify(payload)
}

function renderTrace(err: unknown): string | undefined {
  if (isChainError(err)) return formatDefault(err)
  if (err instanceof Error) return err.stack

  return undefined
}

function formatPretty({ timestamp, level, message, fields }: Entry): string {
  const { err, ...rest } = fields

  if ("err" in fields) {
    rest.err = isErrorLike(err) ? serializeError(err) : err
  }

  const tail = Object.keys(rest).length ? ` ${safeStringify(rest)}` : ""
  const line = `${timestamp} ${level.toUpperCase()} ${message}${tail}`

  const trace = renderTrace(err)
  if (!trace) return line

  const indented = trace
    .split("\n")
    .map((l) => `  ${l}`)
    .join("\n")

  return `${line}\n${indented}`
}

export function createConsoleLogger<TContext extends LogContext = LogContext>(
  deps: ConsoleLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
): Logger<TContext> {
  return new ConsoleLogger<TContext>(deps, opts)
}
