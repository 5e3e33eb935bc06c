export {
  type ConsoleLoggerDeps,
  type ConsoleWriter,
  ConsoleLogger,
  createConsoleLogger,
} from "./adapters/console/console-logger"
export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export {
  createPinoLogger,
  PinoLogger,
  type PinoLoggerDeps,
  serializeErr,
} from "./adapters/pino/pino-logger"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export {
  isLogLevelName,
  LEVEL_SEVERITY,
  type LogLevel,
  type LogLevelName,
  logLevelNames,
  LogLevels,
} from "./ports/log-level"
export type { Logger } from "./ports/logger"
export { LOGGER_DEFAULTS, type LoggerOptions } from "./ports/logger-options"
