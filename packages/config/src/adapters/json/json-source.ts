import fs from "node:fs/promises"
import path from "node:path"
import type { ConfigSource } from "../../ports/source"
import { isMissingFile } from "../dotenv/dotenv-source"

export type JsonSourceOptions = {
  /**
   * Path to a JSON file holding one object, absolute or relative to `cwd`.
   *
   * @example "plugin.json", "./config/plugin.json"
   */
  file: string

  /** When false a missing file loads as `{}`. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) return {}
      throw err
    }

    const parsed: unknown = JSON.parse(content)

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new TypeError(`${this.opts.file} must hold a JSON object`)
    }

    return { ...parsed }
  }
}
