import type { EnumDescTable } from "../../ports/enum-desc"
import type { OptionCodec } from "../../ports/option-codec"
import { defineCodec } from "../define-codec"
import { InvalidFormatError } from "../errors"
import { enumTypeName } from "../type-name"

/**
 * Single-valued enum rendered by its descriptor name.
 *
 * @example
 * ```ts
 * const codec = enumCodec([
 *   { value: "spaces", name: "spaces" },
 *   { value: "tabs", name: "tabs" },
 * ] as const)
 *
 * codec.typeName       // "enum(spaces|tabs)"
 * codec.fromText("x")  // throws InvalidFormatError
 * ```
 */
export function enumCodec<V>(desc: EnumDescTable<V>): OptionCodec<V> {
  const typeName = enumTypeName("enum", desc)
  const names = desc.map((d) => d.name).join("|")

  return defineCodec<V>({
    typeName,
    toText: (value) => {
      const entry = desc.find((d) => Object.is(d.value, value))
      if (!entry) {
        throw new InvalidFormatError(`value is not a member of ${typeName}`, {
          value,
          typeName,
        })
      }
      return entry.name
    },
    fromText: (text) => {
      const entry = desc.find((d) => d.name === text)
      if (!entry) {
        throw new InvalidFormatError(`invalid enum value '${text}', expected one of ${names}`, {
          text,
          typeName,
        })
      }
      return entry.value
    },
  })
}
