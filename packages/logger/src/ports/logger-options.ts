import type { LogLevelName } from "./log-level"

/**
 * Settings shared by every adapter.
 *
 * @remarks
 * Adapters decide how to honor them: the console adapter filters and formats
 * itself, the pino adapter hands both to pino.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. Defaults to "info". */
  level: LogLevelName

  /**
   * Human-readable lines instead of one JSON object per line. Error chains
   * are then printed as their message list plus the origin stack.
   */
  prettify?: boolean
}

export const LOGGER_DEFAULTS: Readonly<Required<LoggerOptions>> = Object.freeze({
  level: "info",
  prettify: false,
})
