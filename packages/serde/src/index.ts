export {
  DeserializeError,
  type DeserializeErrorCode,
  describeJsonType,
  describeTextError,
} from "./core/deserialize-error"
export {
  type AnyStorage,
  createTextCodecFromSettings,
  loadSerdeSettings,
  type SerdeSettings,
  type SettingsCodec,
  type StorageName,
  serdeSettingsSchema,
  storageNames,
  storageStrategy,
} from "./core/settings"
export { type TextCodecOptions, textCodec } from "./core/text-codec"
export { textSchema } from "./core/text-schema"
export type { Codec } from "./ports/codec"
