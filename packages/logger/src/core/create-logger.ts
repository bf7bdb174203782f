import type { DestinationStream } from "pino"
import { ConsoleLogger, type ConsoleWriter } from "../adapters/console/console-logger"
import { PinoLogger } from "../adapters/pino/pino-logger"
import type { LogContext, LogContextPatch } from "../ports/log-context"
import type { Logger } from "../ports/logger"
import type { LoggerOptions } from "../ports/logger-options"

export const loggerFormats = ["json", "console"] as const

export type LoggerFormat = (typeof loggerFormats)[number]

export type CreateLoggerOptions = Partial<LoggerOptions> & {
  /** "json" logs through pino, "console" through the console adapter. @default "json" */
  format?: LoggerFormat
  context?: LogContextPatch
  /** Pino destination, for the json format. */
  destination?: DestinationStream
  /** Console writer, for the console format. */
  console?: ConsoleWriter
}

export function createLogger<TContext extends LogContext = LogContext>(
  options: CreateLoggerOptions = {},
): Logger<TContext> {
  const { format = "json", context = {}, destination, console: writer, ...opts } = options

  if (format === "console") {
    return new ConsoleLogger<TContext>(writer ? { console: writer } : {}, opts, context)
  }

  return new PinoLogger<TContext>(destination ? { destination } : {}, opts, context)
}
