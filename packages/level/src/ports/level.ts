/**
 * The importance or severity of a log event. The higher the level, the more
 * important or severe the event.
 *
 * @remarks
 * A Level is any safe integer. The five named levels in {@link Levels} are
 * reference points; values between or beyond them are written as an offset
 * from the nearest named level below, e.g. `INFO+2` or `TRACE-3`.
 */
export type Level = number

/**
 * Named severity levels, spaced four apart so that custom levels fit between
 * them.
 */
export const Levels = {
  /** Finest-grained diagnostic information. */
  Trace: -8,
  /** Information useful during development and investigation. */
  Debug: -4,
  /** Normal operation. */
  Info: 0,
  /** Potential issues or unexpected situations. */
  Warn: 4,
  /** Failures of the current operation. */
  Error: 8,
} as const

export const levelNames = ["TRACE", "DEBUG", "INFO", "WARN", "ERROR"] as const

export type LevelName = (typeof levelNames)[number]

export const LEVEL_ANCHORS: Readonly<Record<LevelName, Level>> = {
  TRACE: Levels.Trace,
  DEBUG: Levels.Debug,
  INFO: Levels.Info,
  WARN: Levels.Warn,
  ERROR: Levels.Error,
}
