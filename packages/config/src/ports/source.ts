export type SourceValues = Record<string, unknown>

/**
 * Raw setting values keyed by setting name (`STORAGE`, `LOG_LEVEL`).
 *
 * Sources never validate. `loadConfig` merges them in order, so a later
 * source overrides an earlier one.
 */
export interface ConfigSource {
  /** e.g. "env", "object:overrides" */
  readonly name: string

  /**
   * A fresh copy on every call. An `undefined` or empty value means the
   * setting was not provided.
   */
  load(): Promise<SourceValues>

  /**
   * Where this source reads `key` from, as shown to whoever has to fix it,
   * e.g. "env TEXTKIND_STORAGE".
   */
  locate(key: string): string
}
