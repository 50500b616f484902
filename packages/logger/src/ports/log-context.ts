/** Fields components bind to their child loggers. */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Where configurations are read from, e.g. `s3://bucket/flags.json`. */
  location: string
  alias: string
  task: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Partial overlay applied by `child()`. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
