import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys starting with this prefix are loaded, with the prefix stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const loaded: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (!key.startsWith(this.prefix)) continue

      loaded[key.slice(this.prefix.length)] = value
    }

    return loaded
  }
}
