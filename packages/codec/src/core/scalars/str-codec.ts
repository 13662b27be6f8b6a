import { defineCodec } from "../define-codec"

/** Plain text; `add` appends. */
export const strCodec = defineCodec<string>({
  typeName: "str",
  toText: (value) => value,
  fromText: (text) => text,
  add: (current, delta) => ({ value: current + delta, changed: delta.length > 0 }),
})
