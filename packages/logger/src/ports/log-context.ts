/**
 * Fields a binder attaches to its log entries.
 *
 * - `module`: the component emitting the entry ("binder", "document", ...)
 * - `source`: where a value came from ("env", "flag", "document")
 * - `path`: dotted field path, e.g. "server.port"
 * - `key`: environment key or flag name that supplied the value
 * - `file`: document file being loaded
 */
export type LogContext = {
  module: string
  source: string
  path: string
  key: string
  file: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
