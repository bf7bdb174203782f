import { serializeError } from "@plugkit/errors"
import { formatLevel, type Level, type LevelName, Levels, levelName } from "@plugkit/level"
import { isLevelEnabled } from "../../core/level-filter"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

type ConsoleMethod = "debug" | "info" | "warn" | "error"

export type ConsoleWriter = Pick<Console, ConsoleMethod>

export type ConsoleLoggerDeps = {
  console?: ConsoleWriter
}

// console.trace prints a stack trace, so TRACE goes to debug.
const LEVEL_TO_CONSOLE_METHOD: Record<LevelName, ConsoleMethod> = {
  TRACE: "debug",
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
}

const RESERVED_KEYS = ["timestamp", "level", "message"] as const

export class ConsoleLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly sink: ConsoleWriter
  private readonly context: Record<string, unknown>

  constructor(
    private readonly deps: ConsoleLoggerDeps = {},
    private readonly opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.sink = deps.console ?? globalThis.console
    this.context = stripUndefined(context)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new ConsoleLogger<TContext & U>(this.deps, this.opts, {
      ...this.context,
      ...stripUndefined(context),
    })
  }

  enabled(level: Level): boolean {
    return isLevelEnabled(level, this.opts)
  }

  log(level: Level, message: string, meta?: LogMeta<TContext>): void {
    this.write(level, message, meta)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write(Levels.Trace, message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write(Levels.Debug, message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write(Levels.Info, message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write(Levels.Warn, message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write(Levels.Error, message, meta)
  }

  private write(level: Level, message: string, meta?: LogMeta<TContext>) {
    if (!this.enabled(level)) return

    const fields = { ...this.context, ...(meta ? stripUndefined(meta) : {}) }
    for (const key of RESERVED_KEYS) delete fields[key]

    const payload: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level: formatLevel(level),
      message,
      ...fields,
    }

    if (payload.err instanceof Error) {
      payload.err = serializeError(payload.err, { includeStack: true })
    }

    const output = this.opts.prettify ? formatPretty(payload) : safeStringify(payload)

    this.sink[LEVEL_TO_CONSOLE_METHOD[levelName(level)]](output)
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }
  return out
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    return JSON.stringify({ message: "Failed to stringify log payload" })
  }
}

/**
 * `<timestamp> <LEVEL> <message> {rest}`, then the error stack indented on
 * the following lines.
 */
function formatPretty(payload: Record<string, unknown>): string {
  const { timestamp, level, message, err, ...rest } = payload

  const errStack = isRecord(err) ? err.stack : undefined
  let stack: string | undefined

  if (isRecord(err) && typeof errStack === "string") {
    const { stack: _stack, ...errWithoutStack } = err
    stack = errStack
    rest.err = errWithoutStack
  } else if (err !== undefined) {
    rest.err = err
  }

  const tail = Object.keys(rest).length ? ` ${safeStringify(rest)}` : ""
  const line = `${String(timestamp)} ${String(level)} ${String(message)}${tail}`

  if (!stack) return line

  const indentedStack = stack
    .split("\n")
    .map((l) => `  ${l}`)
    .join("\n")

  return `${line}\n${indentedStack}`
}

export function createConsoleLogger<TContext extends LogContext = LogContext>(
  deps: ConsoleLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  context: LogContextPatch = {},
): Logger<TContext> {
  return new ConsoleLogger<TContext>(deps, opts, context)
}
