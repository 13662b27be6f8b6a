import type { OptionCodec } from "../../ports/option-codec"
import { defineCodec } from "../define-codec"
import { InvalidFormatError } from "../errors"
import { addInteger, formatInteger, INT32_RANGE, type IntegerRange, parseInteger } from "./integer"

/**
 * Codec for a branded integer (see {@link Brand}). Text is the underlying
 * int; `guard` decides which ints are valid members of the type. A sum
 * outside the int range is rejected before the guard sees it.
 *
 * @example
 * ```ts
 * type LineCount = Brand<number, "LineCount">
 * const isLineCount = (n: number): n is LineCount => n >= 0
 * const lineCountCodec = newtypeCodec("line-count", isLineCount)
 * ```
 */
export function newtypeCodec<T extends number>(
  typeName: string,
  guard: (n: number) => n is T,
): OptionCodec<T> {
  const range: IntegerRange = { ...INT32_RANGE, typeName }

  return defineCodec<T>({
    typeName,
    toText: formatInteger,
    fromText: (text) => {
      const n = parseInteger(text)
      if (!guard(n)) {
        throw new InvalidFormatError(`'${text}' is not a valid ${typeName}`, { text, typeName })
      }
      return n
    },
    add: (current, delta) => {
      const { sum: n, amount } = addInteger(current, delta, range)
      if (!guard(n)) {
        throw new InvalidFormatError(`adding '${delta}' gives an invalid ${typeName}`, {
          text: delta,
          typeName,
        })
      }
      return { value: n, changed: amount !== 0 }
    },
  })
}
