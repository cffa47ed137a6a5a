import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

const discard = (): void => {}

/** A logger that drops every entry; the default wherever one is optional. */
export function createNullLogger<TContext extends LogContext = LogContext>(): Logger<TContext> {
  return {
    trace: discard,
    debug: discard,
    info: discard,
    warn: discard,
    error: discard,
    fatal: discard,
    child: <U extends LogContextPatch>(_context: U): Logger<TContext & U> =>
      createNullLogger<TContext & U>(),
  }
}
