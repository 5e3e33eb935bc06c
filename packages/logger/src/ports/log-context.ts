export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the operation being performed, e.g. "orders.save" */
  operation: string
  requestId: string
}

export type LogEvent = {
  /** Any thrown value; adapters render error chains in full. */
  err: unknown
  durationMs: number
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
