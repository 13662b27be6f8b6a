export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export { DEFAULT_ENV_PREFIX, loadRawOptions, type LoadRawOptionsOptions } from "./core/load"
export { normalizeKey } from "./core/normalize-key"
export {
  rawOptionRecordSchema,
  rawOptionScalarSchema,
  rawOptionValueSchema,
} from "./core/raw-option-schema"
export { RawOptions } from "./core/raw-options"
export type { RawOptionRecord, RawOptionScalar, RawOptionValue } from "./ports/raw-option"
export type { IRawOptions } from "./ports/raw-options"
export type { ConfigSource } from "./ports/source"
