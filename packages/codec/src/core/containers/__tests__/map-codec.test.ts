import { describeOptionCodecContract } from "../../../ports/__tests__/option-codec.contract"
import { InvalidFormatError, UnsupportedOperationError } from "../../errors"
import { boolCodec } from "../../scalars/bool-codec"
import { intCodec } from "../../scalars/int-codec"
import { strCodec } from "../../scalars/str-codec"
import { mapOf } from "../map-codec"

const intToBool = mapOf(intCodec, boolCodec)
const strToStr = mapOf(strCodec, strCodec)

describeOptionCodecContract({
  name: "mapOf(intCodec, boolCodec)",
  codec: intToBool,
  typeName: "int-to-bool-map",
  samples: [
    new Map(),
    new Map([[1, true]]),
    new Map([
      [1, true],
      [2, false],
    ]),
  ],
  invalid: ["1", "1=true:2", "1=true=false", "x=true", "1=maybe"],
})

describeOptionCodecContract({
  name: "mapOf(strCodec, strCodec)",
  codec: strToStr,
  typeName: "str-to-str-map",
  samples: [
    new Map([["a=b", "c:d"]]),
    new Map([
      ["path", "C:\\tmp"],
      ["", ""],
    ]),
  ],
  invalid: ["a", "a=1:b"],
})

describe("mapOf", () => {
  it("renders key=value entries joined with ':'", () => {
    const map = new Map([
      [1, true],
      [2, false],
    ])

    expect(intToBool.toText(map)).toBe("1=true:2=false")
  })

  it("escapes '=' inside keys and values, then ':' around the entry", () => {
    expect(strToStr.toText(new Map([["a=b", "c:d"]]))).toBe("a\\\\=b=c\\:d")
  })

  it("decodes nested escapes", () => {
    expect(strToStr.fromText("a\\\\=b=c\\:d")).toEqual(new Map([["a=b", "c:d"]]))
  })

  it("decodes the empty text as the empty map", () => {
    expect(intToBool.fromText("")).toEqual(new Map())
  })

  it("rejects an entry without '='", () => {
    expect(() => strToStr.fromText("a=1:b")).toThrow(InvalidFormatError)
    expect(() => strToStr.fromText("a=1:b")).toThrow("map option expects key=value")
  })

  it("keeps the last value of a repeated key", () => {
    expect(intToBool.fromText("1=true:1=false")).toEqual(new Map([[1, false]]))
  })

  it("ignores entry order when comparing", () => {
    const a = new Map([
      [1, true],
      [2, false],
    ])
    const b = new Map([
      [2, false],
      [1, true],
    ])

    expect(intToBool.equals(a, b)).toBe(true)
    expect(intToBool.equals(a, new Map([[1, true]]))).toBe(false)
    expect(intToBool.equals(new Map([[1, true]]), new Map([[1, false]]))).toBe(false)
  })

  it("has no add operation", () => {
    expect(() => intToBool.add(new Map(), "1=true")).toThrow(UnsupportedOperationError)
  })
})
