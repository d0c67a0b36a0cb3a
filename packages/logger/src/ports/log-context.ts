/**
 * Well-known fields attached to log entries emitted by the command layer.
 */
export type LogContext = {
  module: string

  /** Wire command name, e.g. `HSCAN`. */
  command: string
  /** Fully-qualified key the command addressed. */
  key: string

  /** Scan position sent or received. */
  position: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay merged into a logger's bound context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
