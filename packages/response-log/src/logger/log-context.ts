export type LogContext = {
  service: string
  module: string

  measurement: string
  namespace: string
  sink: string

  method: string
  path: string
  status: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>
