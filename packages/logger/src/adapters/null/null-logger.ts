import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

type Discard<TContext extends LogContext> = (message: string, meta?: LogMeta<TContext>) => void

const discard = (): void => {}

/** Drops every entry without looking at it. */
export class NullLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  readonly trace: Discard<TContext> = discard
  readonly debug: Discard<TContext> = discard
  readonly info: Discard<TContext> = discard
  readonly warn: Discard<TContext> = discard
  readonly error: Discard<TContext> = discard
  readonly fatal: Discard<TContext> = discard

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return new NullLogger<TContext & U>()
  }
}

export function createNullLogger<
  TContext extends LogContext = LogContext,
>(): Logger<TContext> {
  return new NullLogger<TContext>()
}
