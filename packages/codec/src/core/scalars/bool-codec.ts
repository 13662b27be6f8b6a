import { defineCodec } from "../define-codec"
import { InvalidFormatError } from "../errors"

export const boolCodec = defineCodec<boolean>({
  typeName: "bool",
  toText: (value) => (value ? "true" : "false"),
  fromText: (text) => {
    if (text === "true" || text === "yes") return true
    if (text === "false" || text === "no") return false

    throw new InvalidFormatError("boolean values are either true, yes, false or no", {
      text,
    })
  },
})
