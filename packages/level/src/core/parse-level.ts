import { LEVEL_ANCHORS, type Level, levelNames } from "../ports/level"
import { LevelError } from "./level-error"

const OFFSET_PATTERN = /^[+-]\d+$/

export type LevelParseResult =
  | { success: true; level: Level }
  | { success: false; error: LevelError }

function parseOffset(offset: string, input: string): number {
  if (!OFFSET_PATTERN.test(offset)) {
    throw LevelError.invalidOffset(offset, input, "invalid syntax")
  }

  const value = Number(offset)

  if (!Number.isSafeInteger(value)) {
    throw LevelError.invalidOffset(offset, input, "value out of range")
  }

  return value
}

/**
 * Parse a level string. Accepts everything {@link formatLevel} produces,
 * ignoring case, and also any other named level plus offset that adds up to
 * the same value: "Error-8" parses to the same level as "INFO".
 *
 * @throws LevelError `invalid_offset` when the text from the first `+` or `-`
 * is not a signed decimal integer, `unknown_name` when the text before it is
 * not a level name.
 */
export function parseLevel(input: string): Level {
  let name = input
  let offsetText = ""
  let offset = 0

  const signAt = input.search(/[+-]/)

  if (signAt >= 0) {
    name = input.slice(0, signAt)
    offsetText = input.slice(signAt)
    offset = parseOffset(offsetText, input)
  }

  const upper = name.toUpperCase()
  const matched = levelNames.find((n) => n === upper)

  if (matched === undefined) {
    throw LevelError.unknownName(name, input)
  }

  const level = LEVEL_ANCHORS[matched] + offset

  if (!Number.isSafeInteger(level)) {
    throw LevelError.invalidOffset(offsetText, input, "value out of range")
  }

  return level
}

/**
 * Non-throwing {@link parseLevel}.
 */
export function safeParseLevel(input: string): LevelParseResult {
  try {
    return { success: true, level: parseLevel(input) }
  } catch (err) {
    if (err instanceof LevelError) return { success: false, error: err }
    throw err
  }
}
