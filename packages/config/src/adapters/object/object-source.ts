import type { ConfigSource } from "../../ports/source"

/** In-code overrides, usually applied after the environment. */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly obj: Record<string, unknown>,
    name = "overrides",
  ) {
    this.name = `object:${name}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
