export type LogContext = {
  /** Option scope the entry belongs to, e.g. `global` or `buffer:main.ts` */
  scope: string
  option: string
  /** Config source that supplied a value, e.g. `env` or `json:options.json` */
  source: string

  service: string
  module: string
  env: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields added by `child()` on top of the parent's context.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
