import { coordCodec } from "../../coord/coord-codec"
import { debugFlagsDesc, DebugFlags } from "../../enum/debug-flags"
import { flagsCodec } from "../../enum/flags-codec"
import { intCodec } from "../../scalars/int-codec"
import { strCodec } from "../../scalars/str-codec"
import { listOf } from "../list-codec"
import { mapOf } from "../map-codec"
import { timestampedListOf } from "../prefixed-list-codec"
import { tupleOf } from "../tuple-codec"

describe("nested containers", () => {
  it("round-trips a list of lists", () => {
    const codec = listOf(listOf(strCodec))
    const value = [["a", "b:c"], ["d\\"], ["e", "f"]]

    const text = codec.toText(value)

    expect(text).toBe("a\\:b\\\\\\:c:d\\\\\\\\:e\\:f")
    expect(codec.fromText(text)).toEqual(value)
  })

  it("round-trips a list of maps", () => {
    const codec = listOf(mapOf(strCodec, intCodec))
    const value = [
      new Map([
        ["a", 1],
        ["b", 2],
      ]),
      new Map([["c=d", 3]]),
    ]

    const text = codec.toText(value)

    expect(codec.typeName).toBe("str-to-int-map-list")
    expect(codec.equals(codec.fromText(text), value)).toBe(true)
  })

  it("round-trips a map of lists", () => {
    const codec = mapOf(strCodec, listOf(intCodec))
    const value = new Map([
      ["odd", [1, 3, 5]],
      ["even", [2, 4]],
    ])

    expect(codec.typeName).toBe("str-to-int-list-map")
    expect(codec.equals(codec.fromText(codec.toText(value)), value)).toBe(true)
  })

  it("round-trips a list of tuples holding flags and coordinates", () => {
    const codec = listOf(tupleOf(coordCodec, flagsCodec(debugFlagsDesc), strCodec))
    const value: [{ line: number; column: number }, number, string][] = [
      [{ line: 1, column: 2 }, DebugFlags.Hooks | DebugFlags.Shell, "x:y|z"],
      [{ line: 3, column: 4 }, DebugFlags.None, ""],
    ]

    const text = codec.toText(value)

    expect(codec.typeName).toBe("coord-flags(hooks|shell|profile|keys)-str-tuple-list")
    expect(codec.equals(codec.fromText(text), value)).toBe(true)
  })

  it("round-trips a timestamped list of tuples", () => {
    const codec = timestampedListOf(tupleOf(intCodec, strCodec))
    const value = {
      prefix: 42,
      list: [
        [1, "one"],
        [2, "t:w|o"],
      ] satisfies [number, string][],
    }

    const text = codec.toText(value)

    expect(text).toBe("42:1|one:2|t\\:w\\\\|o")
    expect(codec.fromText(text)).toEqual(value)
  })
})
