export type LogContext = {
  service: string
  module: string
  env: string

  /** Correlates every record emitted for one logical execution. */
  executionId: string
  traceId: string
}

export type LogEvent = {
  err: unknown
}

/**
 * Per-call metadata: context fields, an optional `err`, and any other
 * structured fields the call site wants to record.
 */
export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
