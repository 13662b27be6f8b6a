import { defineCodec } from "../define-codec"
import { addInteger, formatInteger, INT32_RANGE, parseInteger } from "./integer"

export const intCodec = defineCodec<number>({
  typeName: "int",
  toText: formatInteger,
  fromText: (text) => parseInteger(text, INT32_RANGE),
  add: (current, delta) => {
    const { sum, amount } = addInteger(current, delta, INT32_RANGE)
    return { value: sum, changed: amount !== 0 }
  },
})
