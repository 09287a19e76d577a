import type { LogContext, LogContextPatch, LogMeta } from "../logger/log-context"
import type { LogLevelName } from "../logger/log-level"
import type { Logger } from "../logger/logger"

export type LoggedEntry = {
  level: LogLevelName
  message: string
  meta: Record<string, unknown>
}

/** Logger that keeps entries in memory; children share the parent's list. */
export class RecordingLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(
    readonly entries: LoggedEntry[] = [],
    private readonly context: LogContextPatch = {},
  ) {}

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.push("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.push("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.push("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.push("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.push("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.push("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new RecordingLogger<TContext & U>(this.entries, { ...this.context, ...context })
  }

  at(level: LogLevelName): LoggedEntry[] {
    return this.entries.filter((e) => e.level === level)
  }

  private push(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    this.entries.push({ level, message, meta: { ...this.context, ...meta } })
  }
}
