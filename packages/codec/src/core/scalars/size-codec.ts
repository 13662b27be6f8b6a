import { defineCodec } from "../define-codec"
import { InvalidFormatError } from "../errors"
import { addInteger, formatInteger, INT32_RANGE, type IntegerRange, parseInteger } from "./integer"

const SIZE_RANGE: IntegerRange = {
  typeName: "size",
  min: 0,
  max: Number.MAX_SAFE_INTEGER,
}

/**
 * Non-negative safe integer. `add` takes a signed delta but refuses to go
 * below zero or past `Number.MAX_SAFE_INTEGER`.
 */
export const sizeCodec = defineCodec<number>({
  typeName: "size",
  toText: formatInteger,
  fromText: (text) => parseInteger(text, SIZE_RANGE),
  add: (current, delta) => {
    const amount = parseInteger(delta, INT32_RANGE)

    if (current + amount < 0) {
      throw new InvalidFormatError(`adding '${delta}' would make size negative`, {
        text: delta,
        typeName: "size",
      })
    }

    const { sum } = addInteger(current, delta, SIZE_RANGE)
    return { value: sum, changed: amount !== 0 }
  },
})
