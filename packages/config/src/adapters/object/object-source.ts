import type { ConfigSource, SourceValues } from "../../ports/source"

/**
 * Settings given in code, e.g. overrides from a command line or a test.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: SourceValues,
    label = "overrides",
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<SourceValues> {
    return { ...this.values }
  }

  locate(key: string): string {
    return `${this.name} ${key}`
  }
}
