export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { Config, type ProvidedSetting } from "./core/config"
export { ConfigError, type LoadConfigOptions, loadConfig } from "./core/load"
export type { IConfig, UnknownSetting } from "./ports/config"
export type { ConfigSource, SourceValues } from "./ports/source"
