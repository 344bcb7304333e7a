import type { ConfigSource, SourceValues } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with it are read, and it is stripped. Default "TEXTKIND_" */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Settings from environment variables, `TEXTKIND_STORAGE` → `STORAGE`.
 * Values are trimmed.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? "TEXTKIND_"
    this.env = options.env ?? process.env
  }

  async load(): Promise<SourceValues> {
    const values: SourceValues = {}

    for (const [variable, value] of Object.entries(this.env)) {
      if (value === undefined || !variable.startsWith(this.prefix)) continue

      values[variable.slice(this.prefix.length)] = value.trim()
    }

    return values
  }

  locate(key: string): string {
    return `${this.name} ${this.prefix}${key}`
  }
}
