export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels, higher is more severe.
 *
 * The values match pino's, so a record written by either adapter can be
 * filtered the same way.
 */
export const LogLevels = {
  /** Finest-grained diagnostic information. */
  Trace: 10,
  Debug: 20,
  Info: 30,
  Warn: 40,
  /** A failure in the current operation. */
  Error: 50,
  /** The process may be unable to continue. */
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export const LEVEL_SEVERITY: Readonly<Record<LogLevelName, LogLevel>> = {
  trace: LogLevels.Trace,
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
  fatal: LogLevels.Fatal,
}

export function isLogLevelName(value: unknown): value is LogLevelName {
  return logLevelNames.some((name) => name === value)
}
