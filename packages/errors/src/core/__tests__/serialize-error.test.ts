import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("serializes every BaseError field", () => {
    const err = new BaseError("bad separator", {
      code: "invalid_separator",
      context: { separator: "::" },
      isOperational: false,
    })

    expect(serializeError(err)).toEqual({
      name: "BaseError",
      code: "invalid_separator",
      message: "bad separator",
      context: { separator: "::" },
      isOperational: false,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("adds the stack only when requested", () => {
    const err = new BaseError("test", { code: "test" })

    expect("stack" in serializeError(err)).toBe(false)
    expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
  })

  it("serializes the cause chain", () => {
    const root = new Error("root cause")
    const middle = new BaseError("middle", { code: "middle", cause: root })
    const outer = new BaseError("outer", { code: "outer", cause: middle })

    const serialized = serializeError(outer)

    expect(serialized.cause?.code).toBe("middle")
    expect(serialized.cause?.cause?.code).toBe("unknown")
    expect(serialized.cause?.cause?.message).toBe("root cause")
  })

  it("marks a plain Error as non-operational", () => {
    const serialized = serializeError(new TypeError("not a function"))

    expect(serialized.name).toBe("TypeError")
    expect(serialized.code).toBe("unknown")
    expect(serialized.isOperational).toBe(false)
  })

  it("wraps thrown strings and other values", () => {
    expect(serializeError("boom")).toMatchObject({
      name: "NonErrorThrown",
      message: "boom",
      context: {},
    })
    expect(serializeError({ n: 1 })).toMatchObject({
      message: "Unknown error",
      context: { value: { n: 1 } },
    })
  })
})
