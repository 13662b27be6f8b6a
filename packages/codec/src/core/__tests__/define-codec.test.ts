import { defineCodec } from "../define-codec"
import { UnsupportedOperationError } from "../errors"

describe("defineCodec", () => {
  const upper = defineCodec<string>({
    typeName: "upper",
    toText: (value) => value.toLowerCase(),
    fromText: (text) => text.toUpperCase(),
  })

  it("delegates toText and fromText", () => {
    expect(upper.typeName).toBe("upper")
    expect(upper.toText("ABC")).toBe("abc")
    expect(upper.fromText("abc")).toBe("ABC")
  })

  it("rejects add when the definition has none", () => {
    expect(() => upper.add("A", "B")).toThrow(UnsupportedOperationError)

    try {
      upper.add("A", "B")
    } catch (err) {
      expect(err).toMatchObject({
        code: "unsupported_operation",
        message: "no add operation supported for this option type",
        context: { typeName: "upper" },
      })
    }
  })

  it("uses the definition's add when present", () => {
    const counter = defineCodec<number>({
      typeName: "counter",
      toText: String,
      fromText: Number,
      add: (current, delta) => ({ value: current + delta.length, changed: delta.length > 0 }),
    })

    expect(counter.add(1, "abc")).toEqual({ value: 4, changed: true })
  })

  it("defaults equality to Object.is", () => {
    expect(upper.equals("A", "A")).toBe(true)
    expect(upper.equals("A", "B")).toBe(false)
  })

  it("uses the definition's equality when present", () => {
    const caseless = defineCodec<string>({
      typeName: "caseless",
      toText: (value) => value,
      fromText: (text) => text,
      equals: (a, b) => a.toLowerCase() === b.toLowerCase(),
    })

    expect(caseless.equals("Tab", "TAB")).toBe(true)
  })
})
