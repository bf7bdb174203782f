import type { ConfigSource } from "../../ports/source"

/**
 * In-memory values, typically those set by command-line flags, applied last so
 * they override files and the environment.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly obj: Record<string, unknown>,
    name: string = "overrides",
  ) {
    this.name = `object:${name}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
