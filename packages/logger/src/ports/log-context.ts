/**
 * Fields that identify where a log record comes from. The host binds
 * `plugin` and `domain` when it launches a plugin; plugins add `command` or
 * `task` for the work at hand.
 */
export type LogContext = {
  plugin: string
  domain: string
  command: string
  task: string
  pid: number

  service: string
  module: string
  env: string
}

export type LogEvent = {
  err: unknown
}

/** Every field optional; an explicit `undefined` is dropped from the record. */
type Omittable<T> = { [K in keyof T]?: T[K] | undefined }

export type LogMeta<TContext extends LogContext = LogContext> = Omittable<TContext> &
  Omittable<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Omittable<LogContext> & Record<string, unknown>
