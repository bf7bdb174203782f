import { z } from "zod"

/**
 * A command-line flag bound to a {@link ConfigEntry}. Setting the flag sets
 * the entry's value.
 */
export const flagSchema = z.object({
  /** Long name, written `--name`. */
  name: z.string(),
  /** One-letter name, written `-n`. Empty when the flag has none. */
  shorthand: z.string().default(""),
  description: z.string(),
  /** Default shown in help output. */
  default: z.string().optional(),
  required: z.boolean().default(false),
})

const boolValue = z.object({ key: z.string(), type: z.literal("bool"), value: z.boolean() })
const intValue = z.object({ key: z.string(), type: z.literal("int"), value: z.int() })
const stringValue = z.object({ key: z.string(), type: z.literal("string"), value: z.string() })

export const keyValueSchema = z.discriminatedUnion("type", [boolValue, intValue, stringValue])

const entryFields = {
  description: z.string().optional(),
  flag: flagSchema.optional(),
  /** Environment variable that overrides the value. */
  env: z.string().optional(),
  /** Only the flag sets this entry; file and environment are not read. */
  flagOnly: z.boolean().default(false),
}

export const configEntrySchema = z.discriminatedUnion("type", [
  boolValue.extend(entryFields),
  intValue.extend(entryFields),
  stringValue.extend(entryFields),
])

export const commandSchema = z.object({
  name: z.string(),
  /** One-line usage for help output, without the plugin domain. */
  usage: z.string(),
  description: z.string(),
  aliases: z.array(z.string()).default([]),
  config: z.array(configEntrySchema).default([]),
})

export const taskSchema = z.object({
  type: z.string(),
  description: z.string(),
  /** Default values for the task's config. */
  config: z.array(keyValueSchema).default([]),
})

export const manifestSchema = z.object({
  name: z.string(),
  domain: z.string(),
  description: z.string(),
  executable: z.string(),
  config: z.array(configEntrySchema).default([]),
  commands: z.array(commandSchema).default([]),
  tasks: z.array(taskSchema).default([]),
})

export type Flag = z.output<typeof flagSchema>
export type KeyValue = z.output<typeof keyValueSchema>
export type KeyValueType = KeyValue["type"]
export type ConfigEntry = z.output<typeof configEntrySchema>
export type Command = z.output<typeof commandSchema>
export type Task = z.output<typeof taskSchema>
export type Manifest = z.output<typeof manifestSchema>

/** The JSON shape accepted by the decoder, before defaults are applied. */
export type ManifestInput = z.input<typeof manifestSchema>
