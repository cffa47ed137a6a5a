import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every adapter.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Leave off where logs are shipped as
   * JSON lines.
   */
  prettify?: boolean
}
