import type { LogContext, LogContextPatch, LogMeta } from "./log-context"
import type { LogLevelName } from "./log-level"

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Creates a logger that carries `context` on every entry in addition to
   * the parent's context. Keys in `context` win on conflict.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Render human-readable lines through pino-pretty instead of JSON.
   * Meant for local development.
   */
  prettify?: boolean
}
