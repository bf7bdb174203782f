import { type Level, Levels, normalizeLevel } from "@plugkit/level"
import type { LoggerOptions } from "../ports/logger-options"

export const DEFAULT_MIN_LEVEL: Level = Levels.Info

/** Compares normalized levels, so a record is filtered under the level it prints as. */
export function isLevelEnabled(level: Level, opts: Partial<LoggerOptions>): boolean {
  return normalizeLevel(level) >= normalizeLevel(opts.level ?? DEFAULT_MIN_LEVEL)
}
