export {
  ConsoleLogger,
  type ConsoleLoggerDeps,
  type ConsoleWriter,
  createConsoleLogger,
} from "./adapters/console/console-logger"
export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export {
  type CreateLoggerOptions,
  createLogger,
  type LoggerFormat,
  loggerFormats,
} from "./core/create-logger"
export { DEFAULT_MIN_LEVEL, isLevelEnabled } from "./core/level-filter"
export {
  type LoadLoggerConfigOptions,
  type LoggerConfig,
  loadLoggerConfig,
  loggerEnvSchema,
} from "./core/load-logger-config"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
