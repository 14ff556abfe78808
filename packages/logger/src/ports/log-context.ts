/**
 * Fields a sequence attaches to its log entries.
 */
export type LogContext = {
  /** Component that emitted the entry, e.g. "cached-source". */
  module: string

  /** Rendered slice descriptor, e.g. "[2::-1]". */
  slice: string

  /** Absolute producer position a read was aimed at. */
  position: number

  /** Items held in the cache when the entry was written. */
  cached: number

  /** Items pulled from the producer by one operation. */
  pulled: number

  /** Total producer size, once known. */
  total: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
