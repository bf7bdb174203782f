import { BaseError } from "@plugkit/errors"

export type ConfigErrorCode = "config_invalid" | "config_source_failed"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(details: string, keys: string[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { keys },
    })
  }

  static sourceFailed(source: string, cause: unknown): ConfigError {
    return new ConfigError(`Configuration source ${source} failed to load`, {
      code: "config_source_failed",
      context: { source },
      cause,
    })
  }
}
