import type { Level } from "@plugkit/level"
import type { LogContext, LogContextPatch, LogMeta } from "./log-context"

export interface Logger<TContext extends LogContext = LogContext> {
  /** Emit a record at any level, named or not. */
  log(level: Level, message: string, meta?: LogMeta<TContext>): void

  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void

  /** Whether a record at `level` would be emitted. */
  enabled(level: Level): boolean

  /**
   * Creates a child logger that inherits the parent context and adds or
   * overrides fields (shallow). The parent is not changed.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
