export { bindCommanderOptions, CommanderFlag } from "./adapters/commander/commander-flag"
export { StaticFlag } from "./adapters/static/static-flag"
export { Binder, type BinderOptions } from "./core/binder"
export { bytesToText, textToBytes } from "./core/bytes"
export {
  bindEnv,
  bindEnvAlias,
  bindFlag,
  bindFlags,
  defaultBinder,
  describeConfig,
  dump,
  load,
  loadFile,
  registerMarshaler,
  registerUnmarshaler,
  resetDefaultBinder,
  resolve,
  setEnvPrefix,
  setExpandEnv,
} from "./core/default-binder"
export type { EnvMap } from "./core/env-binder"
export {
  type BindingSource,
  ConfigError,
  type ConfigErrorCode,
  DocumentError,
  FieldBindingError,
  InvalidTargetError,
  InvalidValueError,
  isConfigError,
  MarshalError,
  ParseValueError,
  UnmarshalError,
  UnsupportedTypeError,
} from "./core/errors"
export { expandEnv } from "./core/expand-env"
export { textual } from "./core/textual"
export type { ConfigSchema, IBinder, ResolveSources } from "./ports/binder"
export type { Marshaler, TextCodec, TextMarshaler, TextUnmarshaler, Unmarshaler } from "./ports/codec"
export type { FieldInfo, FieldKind } from "./ports/field"
export type { FlagHandle } from "./ports/flag"
