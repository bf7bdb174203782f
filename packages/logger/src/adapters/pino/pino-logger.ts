import { formatLevel, type Level, type LevelName, Levels, levelName } from "@plugkit/level"
import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import { isLevelEnabled } from "../../core/level-filter"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /**
   * Base pino logger to create children from. When provided, this adapter
   * only adds the context via `.child(...)`.
   */
  base?: PinoLoggerBase

  /** Where pino writes. Takes precedence over the pretty transport. */
  destination?: DestinationStream
}

type PinoMethod = "trace" | "debug" | "info" | "warn" | "error"

const LEVEL_TO_PINO_METHOD: Record<LevelName, PinoMethod> = {
  TRACE: "trace",
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
}

/**
 * Pino adapter. Records go to the pino method of their level's band, so pino's
 * numeric `level` is coarse; the exact level is written as `severity`
 * ("INFO+2"). Filtering happens here rather than in pino so that minimums
 * between named levels work.
 */
export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase

  constructor(
    protected readonly deps: Readonly<PinoLoggerDeps> = {},
    protected readonly opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.logger = this.init(context)
  }

  private init(context: LogContextPatch): PinoLoggerBase {
    if (this.deps.base) return this.deps.base.child(context)

    const pinoOpts: PinoOptions = {
      level: "trace",
      serializers: { err: errWithCause },
      ...(this.opts.prettify &&
        !this.deps.destination && {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss.l",
              ignore: "hostname",
            },
          },
        }),
    }

    const root = this.deps.destination ? pino(pinoOpts, this.deps.destination) : pino(pinoOpts)

    return root.child(context)
  }

  enabled(level: Level): boolean {
    return isLevelEnabled(level, this.opts)
  }

  log(level: Level, message: string, meta?: LogMeta<TContext>): void {
    if (!this.enabled(level)) return

    this.logger[LEVEL_TO_PINO_METHOD[levelName(level)]](
      { ...meta, severity: formatLevel(level) },
      message,
    )
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.log(Levels.Trace, message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.log(Levels.Debug, message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.log(Levels.Info, message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.log(Levels.Warn, message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.log(Levels.Error, message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({ ...this.deps, base: this.logger }, this.opts, context)
  }
}

export function createPinoLogger<TContext extends LogContext = LogContext>(
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  context: LogContextPatch = {},
): Logger<TContext> {
  return new PinoLogger<TContext>(deps, opts, context)
}
