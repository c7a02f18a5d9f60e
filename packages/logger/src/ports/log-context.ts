/**
 * Well-known fields attached to flag-file log entries.
 */
export type LogContext = {
  service: string
  module: string

  /** Config source identifier: a path or URL. */
  source: string
  line: number

  flag: string
  generation: number
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
