export type LogContext = {
  service: string
  module: string
  env: string

  /** Identifies one dispatch run across all of its log lines. */
  runId: string

  /** Recipient address the line is about. */
  email: string

  /** 1-indexed delivery attempt. */
  attempt: number

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields merged into a child logger's context. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
