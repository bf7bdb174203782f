import { LEVEL_ANCHORS, type Level, type LevelName, Levels } from "../ports/level"

export function isLevel(value: unknown): value is Level {
  return Number.isSafeInteger(value)
}

/**
 * Brings any number onto a Level: fractions are truncated toward zero, values
 * outside the safe-integer range are clamped to it, and NaN becomes INFO.
 */
export function normalizeLevel(value: number): Level {
  if (Number.isNaN(value)) return Levels.Info

  const level = Math.trunc(value)

  if (level > Number.MAX_SAFE_INTEGER) return Number.MAX_SAFE_INTEGER
  if (level < Number.MIN_SAFE_INTEGER) return Number.MIN_SAFE_INTEGER

  return level
}

/**
 * Name of the named level at or below `level`. Anything under DEBUG counts
 * as TRACE and anything from ERROR up counts as ERROR.
 */
export function levelName(value: Level): LevelName {
  const level = normalizeLevel(value)

  if (level < Levels.Debug) return "TRACE"
  if (level < Levels.Info) return "DEBUG"
  if (level < Levels.Warn) return "INFO"
  if (level < Levels.Error) return "WARN"

  return "ERROR"
}

/**
 * Canonical string for a level: the upper-case name of the nearest named
 * level at or below it, followed by the signed offset from that level when
 * the offset is not zero. The value goes through {@link normalizeLevel}
 * first, so the result always parses back.
 *
 * @example
 * ```ts
 * formatLevel(Levels.Warn)      // "WARN"
 * formatLevel(Levels.Warn - 1)  // "INFO+3"
 * formatLevel(Levels.Trace - 2) // "TRACE-2"
 * ```
 */
export function formatLevel(value: Level): string {
  const level = normalizeLevel(value)
  const name = levelName(level)
  const offset = level - LEVEL_ANCHORS[name]

  if (offset === 0) return name

  return offset > 0 ? `${name}+${offset}` : `${name}${offset}`
}
