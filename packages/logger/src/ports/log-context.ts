export type LogContext = {
  service: string
  env: string

  provider: string
  bucket: string
  operation: string
  key: string

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields merged into an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
