export type LogContext = {
  service: string
  backend: string

  cogName: string
  uuid: string
  category: string
  identifier: string

  requestId: string
  method: string
  path: string
  status: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields added to a logger's bindings by `child()`. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
