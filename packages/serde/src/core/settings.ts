import { type ConfigSource, EnvSource, loadConfig, type UnknownSetting } from "@textkind/config"
import {
  createPinoLogger,
  type LogLevelName,
  type Logger,
  logLevelNames,
  type PinoLoggerDeps,
} from "@textkind/logger"
import {
  type AnyKind,
  type AtomicSharedStorage,
  atomicShared,
  defineText,
  type ExclusiveStorage,
  exclusive,
  type SharedStorage,
  type StorageStrategy,
  shared,
  type Text,
} from "@textkind/text"
import { z } from "zod"
import type { Codec } from "../ports/codec"
import { textCodec } from "./text-codec"

export const storageNames = ["exclusive", "shared", "atomic"] as const

export type StorageName = (typeof storageNames)[number]

export type AnyStorage = ExclusiveStorage | SharedStorage | AtomicSharedStorage

const strategies: Readonly<Record<StorageName, StorageStrategy<AnyStorage>>> = {
  exclusive,
  shared,
  atomic: atomicShared,
}

export const serdeSettingsSchema = z.object({
  STORAGE: z.enum(storageNames).default("exclusive"),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type SerdeSettings = Readonly<{
  storage: StorageName
  logLevel: LogLevelName
  logPretty: boolean
  /** Where each setting came from, e.g. "env TEXTKIND_STORAGE" or "default" */
  origins?: Readonly<Record<"storage" | "logLevel" | "logPretty", string>>
  /** Provided but not recognized, usually a misspelled variable */
  unknown?: readonly UnknownSetting[]
}>

/**
 * Read codec settings. Defaults to `TEXTKIND_*` environment variables.
 *
 * @throws ConfigError naming the location of every rejected value
 */
export async function loadSerdeSettings(
  sources: readonly ConfigSource[] = [new EnvSource()],
): Promise<SerdeSettings> {
  const config = await loadConfig({ schema: serdeSettingsSchema, sources })

  return {
    storage: config.get("STORAGE"),
    logLevel: config.get("LOG_LEVEL"),
    logPretty: config.get("LOG_PRETTY"),
    origins: {
      storage: config.explain("STORAGE"),
      logLevel: config.explain("LOG_LEVEL"),
      logPretty: config.explain("LOG_PRETTY"),
    },
    unknown: config.unknownSettings(),
  }
}

export function storageStrategy(name: StorageName): StorageStrategy<AnyStorage> {
  return strategies[name]
}

export type SettingsCodec<K extends AnyKind> = {
  codec: Codec<Text<K, AnyStorage>>
  logger: Logger
}

export function createTextCodecFromSettings<K extends AnyKind>(
  kind: K,
  settings: SerdeSettings,
  deps: PinoLoggerDeps = {},
): SettingsCodec<K> {
  const logger = createPinoLogger(deps, {
    level: settings.logLevel,
    prettify: settings.logPretty,
  })
  const factory = defineText(kind, storageStrategy(settings.storage))

  for (const setting of settings.unknown ?? []) {
    logger.warn("ignoring unknown setting", {
      module: "serde",
      setting: setting.key,
      location: setting.location,
    })
  }

  return { codec: textCodec(factory, { logger }), logger }
}
