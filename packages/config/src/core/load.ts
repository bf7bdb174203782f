import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Applied in order, later sources win. Defaults to the process environment. */
  sources?: ConfigSource[]
  /**
   * Replace `${NAME}` in string values with the merged value of `NAME`, or
   * with an empty string when nothing provides it. One pass, no nesting.
   */
  expandEnv?: boolean
}

const REFERENCE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g

function expand(merged: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(merged)) {
    out[key] =
      typeof value === "string"
        ? value.replace(REFERENCE_PATTERN, (_match, name: string) => {
            const ref = merged[name]
            return typeof ref === "string" || typeof ref === "number" || typeof ref === "boolean"
              ? String(ref)
              : ""
          })
        : value
  }

  return out
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
  expandEnv = false,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    let values: Record<string, unknown>

    try {
      values = await source.load()
    } catch (err) {
      throw ConfigError.sourceFailed(source.name, err)
    }

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const input = expandEnv ? expand(merged) : merged
  const result = schema.safeParse(input)

  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((issue) => String(issue.path[0] ?? "")))]
    throw ConfigError.invalid(z.prettifyError(result.error), keys)
  }

  for (const key of Object.keys(result.data)) {
    if (!(key in provenance)) {
      provenance[key] = "default"
    }
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
