export {
  AtomicSharedStorage,
  type AtomicSharedDescriptor,
  atomicShared,
} from "./adapters/atomic/atomic-shared-storage"
export { ExclusiveStorage, exclusive } from "./adapters/exclusive/exclusive-storage"
export { SharedStorage, shared } from "./adapters/shared/shared-storage"
export { and, AndError, type AndBranch } from "./core/checks/and"
export { escapeChar, trimWhitespace } from "./core/checks/chars"
export {
  IdentifierCheck,
  IdentifierError,
  IdentifierLaxCheck,
  IdentifierLaxError,
  type IdentifierLaxReason,
  type IdentifierReason,
} from "./core/checks/identifier"
export {
  MaxBytes256,
  MaxBytes512,
  MaxBytes1024,
  MaxBytesError,
  maxBytes,
} from "./core/checks/max-bytes"
export { NoControl, NoControlError } from "./core/checks/no-control"
export { NotEmpty, NotEmptyError } from "./core/checks/not-empty"
export { NoWhitespace, NoWhitespaceError } from "./core/checks/no-whitespace"
export { SingleLine, SingleLineError } from "./core/checks/single-line"
export { TitleCheck, type TitleError } from "./core/checks/title"
export {
  Trimmed,
  TrimmedBothError,
  TrimmedError,
  type TrimmedFailure,
  TrimmedLeft,
  TrimmedLeftError,
  TrimmedOnlyError,
  TrimmedRight,
  TrimmedRightError,
} from "./core/checks/trimmed"
export { WhenTrimmedError, whenTrimmed } from "./core/checks/when-trimmed"
export {
  type Converter,
  defineConverter,
  defineTryConverter,
  type TryConverter,
} from "./core/conversion/converter"
export { Data, type DataRepr } from "./core/data/data"
export { SmallString } from "./core/data/small-string"
export { CheckError, valuesEqual } from "./core/errors/check-error"
export { ConvertError } from "./core/errors/convert-error"
export {
  type InvariantCode,
  InvariantError,
  type InvariantErrorOptions,
} from "./core/errors/invariant-error"
export { TextError, TextErrorWithValue } from "./core/errors/text-error"
export { defineKind, validate } from "./core/kinds/kind"
export { Identifier, IdentifierLax, Title } from "./core/kinds/predefined"
export { borrowed, owned } from "./core/maybe-owned"
export { err, ok, passed } from "./core/result"
export { fromCow, fromStorage, fromStr, intoString } from "./core/storage/storage"
export { defineText, type TextFactory } from "./core/text/define-text"
export { Text, type TextLike } from "./core/text/text"
export type { AnyCheck, Check, CheckErrorOf, CheckResult } from "./ports/check"
export type { AnyKind, CheckOf, Kind, KindErrorOf, SameCheck } from "./ports/kind"
export type { MaybeOwned } from "./ports/maybe-owned"
export type { Failure, Result, Success } from "./ports/result"
export type { DynamicStorage, StorageStrategy } from "./ports/storage"
