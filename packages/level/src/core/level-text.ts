import type { AppendingCodec } from "../ports/codec"
import type { Level } from "../ports/level"
import { formatLevel } from "./format-level"
import { parseLevel } from "./parse-level"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

export function appendLevelText(bytes: Uint8Array, level: Level): Uint8Array {
  const encoded = encoder.encode(formatLevel(level))
  const out = new Uint8Array(bytes.length + encoded.length)

  out.set(bytes)
  out.set(encoded, bytes.length)

  return out
}

/** UTF-8 bytes of {@link formatLevel}, unquoted and unterminated. */
export function marshalLevelText(level: Level): Uint8Array {
  return appendLevelText(new Uint8Array(0), level)
}

export function unmarshalLevelText(data: string | Uint8Array): Level {
  return parseLevel(typeof data === "string" ? data : decoder.decode(data))
}

export const levelTextCodec: AppendingCodec<Level> = {
  encode: (level) => marshalLevelText(level),
  decode: (bytes) => unmarshalLevelText(bytes),
  append: (bytes, level) => appendLevelText(bytes, level),
}
