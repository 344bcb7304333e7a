import type { IConfig, UnknownSetting } from "../ports/config"

export type ProvidedSetting = Readonly<{
  value: unknown
  location: string
}>

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  readonly value: Readonly<T>

  constructor(
    value: T,
    private readonly provided: ReadonlyMap<string, ProvidedSetting>,
  ) {
    this.value = Object.freeze(value)
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.value[key]
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provided.get(key)?.location ?? "default"
  }

  unknownSettings(): UnknownSetting[] {
    const unknown: UnknownSetting[] = []

    for (const [key, { location }] of this.provided) {
      if (!Object.hasOwn(this.value, key)) unknown.push({ key, location })
    }

    return unknown
  }
}
