export type LogContext = {
  service: string
  module: string
  env: string

  operation: string
  bucket: string
  key: string
  format: string
  sizeInBytes: number

  hitId: string
  assignmentId: string

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * Fields merged into an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
