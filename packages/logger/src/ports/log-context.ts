/**
 * Well-known fields bound to a logger with `child()`.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Workload API endpoint address the source talks to. */
  endpoint: string
  spiffeId: string
  trustDomain: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
