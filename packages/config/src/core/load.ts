import { BaseError } from "@textkind/errors"
import type { ZodType } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config, type ProvidedSetting } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Defaults to `TEXTKIND_*` environment variables */
  sources?: readonly ConfigSource[]
}

export class ConfigError extends BaseError<"invalid_config"> {}

async function collect(sources: readonly ConfigSource[]): Promise<Map<string, ProvidedSetting>> {
  const provided = new Map<string, ProvidedSetting>()

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined || value === "") continue

      provided.set(key, { value, location: source.locate(key) })
    }
  }

  return provided
}

/**
 * Merge `sources` in order and validate the result against `schema`.
 *
 * @throws ConfigError listing every rejected setting by location, e.g.
 * `env TEXTKIND_STORAGE: Invalid option: ...`
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const provided = await collect(sources)
  const raw = Object.fromEntries([...provided].map(([key, setting]) => [key, setting.value]))
  const result = schema.safeParse(raw)

  if (!result.success) {
    const rejected = result.error.issues.map((issue) => {
      const key = issue.path.map(String).join(".")

      return { location: provided.get(key)?.location ?? key, message: issue.message }
    })

    throw new ConfigError(
      `invalid settings:\n${rejected.map((r) => `  ${r.location}: ${r.message}`).join("\n")}`,
      {
        code: "invalid_config",
        context: {
          sources: sources.map((s) => s.name),
          settings: rejected.map((r) => r.location),
        },
        cause: result.error,
      },
    )
  }

  return new Config(result.data, provided)
}
