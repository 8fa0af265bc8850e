import type { LogBindings, LogMeta } from "./log-context"
import type { LogLevelName } from "./log-level"

export interface Logger {
  trace(message: string, meta?: LogMeta): void
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  fatal(message: string, meta?: LogMeta): void

  /**
   * Returns a logger that adds `bindings` to every entry. Keys in `bindings`
   * shadow the parent's; the parent is left untouched.
   */
  child(bindings: LogBindings): Logger
}

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /** Human readable output through pino-pretty. Local development only. */
  prettify?: boolean
}
