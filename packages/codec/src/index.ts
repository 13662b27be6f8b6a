export {
  type PrefixedList,
  prefixedListOf,
  type TimestampedList,
  timestampedListOf,
} from "./core/containers/prefixed-list-codec"
export { listOf } from "./core/containers/list-codec"
export { mapOf } from "./core/containers/map-codec"
export { type TupleCodecs, tupleOf, type TupleValues } from "./core/containers/tuple-codec"
export { coordCodec, type LineAndColumn } from "./core/coord/coord-codec"
export { type CodecDefinition, defineCodec } from "./core/define-codec"
export { type DebugFlag, DebugFlags, debugFlagsDesc } from "./core/enum/debug-flags"
export { enumCodec } from "./core/enum/enum-codec"
export { flagsCodec } from "./core/enum/flags-codec"
export { InvalidFormatError, UnsupportedOperationError } from "./core/errors"
export { escape, indexOfUnescaped, split, unescape } from "./core/escape/escape"
export * from "./core/escape/separators"
export { boolCodec } from "./core/scalars/bool-codec"
export { intCodec } from "./core/scalars/int-codec"
export {
  addInteger,
  type IntegerRange,
  INT32_RANGE,
  isInRange,
  parseInteger,
} from "./core/scalars/integer"
export { newtypeCodec } from "./core/scalars/newtype-codec"
export { sizeCodec } from "./core/scalars/size-codec"
export { strCodec } from "./core/scalars/str-codec"
export * from "./core/scalars/units"
export * from "./core/type-name"
export type { Brand } from "./ports/brand"
export type { EnumDesc, EnumDescTable } from "./ports/enum-desc"
export type { CodecValue, OptionCodec, OptionUpdate } from "./ports/option-codec"
