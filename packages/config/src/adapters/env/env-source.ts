import type { ConfigSource } from "../../ports/source"
import { filterPrefix } from "../utils/filter-prefix"

export type EnvSourceOptions = {
  /** Only keys with this prefix are loaded, with the prefix stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    return filterPrefix(this.env, this.prefix)
  }
}
