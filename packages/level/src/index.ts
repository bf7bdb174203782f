export { levelSchema } from "./adapters/zod/level-schema"
export { formatLevel, isLevel, levelName, normalizeLevel } from "./core/format-level"
export {
  isLevelError,
  LevelError,
  type LevelErrorCode,
  type OffsetFailure,
} from "./core/level-error"
export { levelJsonCodec, marshalLevelJSON, unmarshalLevelJSON } from "./core/level-json"
export {
  appendLevelText,
  levelTextCodec,
  marshalLevelText,
  unmarshalLevelText,
} from "./core/level-text"
export { type LevelParseResult, parseLevel, safeParseLevel } from "./core/parse-level"
export type { AppendingCodec, Codec } from "./ports/codec"
export { LEVEL_ANCHORS, type Level, type LevelName, Levels, levelNames } from "./ports/level"
