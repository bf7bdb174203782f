import type { Level } from "@plugkit/level"

/**
 * Policy every Logger adapter honors.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit. Records below it are dropped. Any level works,
   * including ones between the named levels such as `Levels.Info + 2`.
   *
   * @default Levels.Info
   */
  level: Level

  /**
   * Human-readable output for local development. Leave off where logs are
   * collected as JSON.
   */
  prettify?: boolean
}
