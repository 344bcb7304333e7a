/**
 * A setting supplied by a source that the schema does not define, usually a
 * misspelled variable.
 */
export type UnknownSetting = Readonly<{
  key: string
  /** e.g. "env TEXTKIND_STORGE" */
  location: string
}>

/**
 * Validated settings plus where each one came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     STORAGE: z.enum(["exclusive", "shared", "atomic"]).default("exclusive"),
 *   }),
 *   sources: [new EnvSource({ env: { TEXTKIND_STORAGE: "shared", TEXTKIND_STORGE: "atomic" } })],
 * })
 *
 * config.get("STORAGE")     // "shared"
 * config.explain("STORAGE") // "env TEXTKIND_STORAGE"
 * config.unknownSettings()  // [{ key: "STORGE", location: "env TEXTKIND_STORGE" }]
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Location of the value that won for `key`, or "default" when the schema
   * supplied it.
   */
  explain<K extends keyof T & string>(key: K): string

  unknownSettings(): UnknownSetting[]
}
