export { decodeManifest, parseManifestJSON } from "./core/decode-manifest"
export { ManifestError, type ManifestErrorCode } from "./core/manifest-error"
export {
  type Command,
  type ConfigEntry,
  commandSchema,
  configEntrySchema,
  type Flag,
  flagSchema,
  type KeyValue,
  type KeyValueType,
  keyValueSchema,
  type Manifest,
  type ManifestInput,
  manifestSchema,
  type Task,
  taskSchema,
} from "./ports/manifest"
