import type { Codec } from "../ports/codec"
import type { Level } from "../ports/level"
import { formatLevel } from "./format-level"
import { LevelError } from "./level-error"
import { parseLevel } from "./parse-level"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * JSON encoding of a level: {@link formatLevel} as a JSON string literal.
 */
export function marshalLevelJSON(level: Level): string {
  return JSON.stringify(formatLevel(level))
}

/**
 * Decode a JSON string literal holding a level string. Accepts any spelling
 * {@link parseLevel} accepts.
 *
 * @throws LevelError `invalid_format` when `data` is not a JSON string, before
 * any level parsing happens.
 */
export function unmarshalLevelJSON(data: string | Uint8Array): Level {
  const text = typeof data === "string" ? data : decoder.decode(data)

  let value: unknown

  try {
    value = JSON.parse(text)
  } catch (err) {
    throw LevelError.invalidFormat(text, err)
  }

  if (typeof value !== "string") {
    throw LevelError.invalidFormat(text)
  }

  return parseLevel(value)
}

export const levelJsonCodec: Codec<Level> = {
  encode: (level) => encoder.encode(marshalLevelJSON(level)),
  decode: (bytes) => unmarshalLevelJSON(bytes),
}
