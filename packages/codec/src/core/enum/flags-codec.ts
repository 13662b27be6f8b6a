import type { EnumDescTable } from "../../ports/enum-desc"
import type { OptionCodec } from "../../ports/option-codec"
import { defineCodec } from "../define-codec"
import { InvalidFormatError } from "../errors"
import { FLAG_SEPARATOR } from "../escape/separators"
import { enumTypeName } from "../type-name"

/**
 * Bit-flag set over a descriptor table of single-bit values.
 *
 * Text is the active names in table order joined with `|`; the empty text
 * is the empty set. `add` is a union.
 */
export function flagsCodec(desc: EnumDescTable<number>): OptionCodec<number> {
  const typeName = enumTypeName("flags", desc)
  const legalBits = desc.reduce((mask, d) => mask | d.value, 0)

  const parse = (text: string): number => {
    if (text === "") return 0

    let flags = 0
    for (const name of text.split(FLAG_SEPARATOR)) {
      const entry = desc.find((d) => d.name === name)
      if (!entry) {
        throw new InvalidFormatError(`invalid flag value '${name}'`, { text, typeName })
      }
      flags |= entry.value
    }
    return flags
  }

  return defineCodec<number>({
    typeName,
    toText: (value) => {
      if ((value & ~legalBits) !== 0) {
        throw new InvalidFormatError(`value has bits outside ${typeName}`, { value, typeName })
      }
      return desc
        .filter((d) => (value & d.value) === d.value && d.value !== 0)
        .map((d) => d.name)
        .join(FLAG_SEPARATOR)
    },
    fromText: parse,
    add: (current, delta) => {
      const flags = parse(delta)
      return { value: current | flags, changed: flags !== 0 }
    },
  })
}
