import { type ConfigSource, DotenvSource, EnvSource, loadConfig, ObjectSource } from "@plugkit/config"
import { Levels, levelSchema } from "@plugkit/level"
import { z } from "zod"
import type { LoggerOptions } from "../ports/logger-options"
import { type LoggerFormat, loggerFormats } from "./create-logger"

export const loggerEnvSchema = z.object({
  LOG_LEVEL: levelSchema.default(Levels.Info),
  LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
  LOG_FORMAT: z.enum(loggerFormats).default("json"),
})

export type LoggerConfig = LoggerOptions & {
  prettify: boolean
  format: LoggerFormat
}

export type LoadLoggerConfigOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>
  /**
   * Only read variables with this prefix, e.g. "ECHO_" for ECHO_LOG_LEVEL.
   * Applies to the dotenv file and the environment.
   */
  prefix?: string
  /** Directory holding the optional dotenv file. @default process.cwd() */
  cwd?: string
  /** @default ".env" */
  envFile?: string
  /** Values from command-line flags; these win over every other source. */
  overrides?: Record<string, unknown>
}

/**
 * Reads LOG_LEVEL, LOG_PRETTY and LOG_FORMAT from the dotenv file, then the
 * environment, then `overrides`. LOG_LEVEL takes any level string, so
 * `LOG_LEVEL=debug+2` is valid.
 *
 * @throws ConfigError `config_invalid` when a value does not parse.
 */
export async function loadLoggerConfig(
  options: LoadLoggerConfigOptions = {},
): Promise<LoggerConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({
      file: options.envFile ?? ".env",
      required: false,
      ...(options.cwd !== undefined && { cwd: options.cwd }),
      ...(options.prefix !== undefined && { prefix: options.prefix }),
    }),
    new EnvSource({
      ...(options.env !== undefined && { env: options.env }),
      ...(options.prefix !== undefined && { prefix: options.prefix }),
    }),
  ]

  if (options.overrides) {
    sources.push(new ObjectSource(options.overrides, "flags"))
  }

  const config = await loadConfig({ schema: loggerEnvSchema, sources })

  return {
    level: config.get("LOG_LEVEL"),
    prettify: config.get("LOG_PRETTY"),
    format: config.get("LOG_FORMAT"),
  }
}
