export type LogContext = {
  /** Name of the kind of the text involved, e.g. "Title" */
  kind: string
  /** Name of the check that ran, e.g. "And<MaxBytes512, Title>" */
  check: string
  /** Name of the dynamic storage strategy, e.g. "exclusive" */
  storage: string
  operation: string

  service: string
  module: string
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
