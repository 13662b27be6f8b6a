import { boolCodec, debugFlagsDesc, flagsCodec, intCodec } from "@optionkit/codec"
import { InvalidOptionNameError, OptionAlreadyDeclaredError, UnknownOptionError } from "../errors"
import { OptionRegistry } from "../option-registry"

describe("OptionRegistry", () => {
  let registry: OptionRegistry

  beforeEach(() => {
    registry = new OptionRegistry()
  })

  it("declares a typed option", () => {
    const tabstop = registry.declare({ name: "tabstop", codec: intCodec, defaultValue: 8 })

    expect(tabstop.name).toBe("tabstop")
    expect(tabstop.typeName).toBe("int")
    expect(tabstop.defaultValue).toBe(8)
    expect(registry.has("tabstop")).toBe(true)
    expect(registry.lookup("tabstop")).toBe(tabstop)
  })

  it.each(["tab-stop", "", "tab stop", "ui.kind"])("rejects the option name %j", (name) => {
    expect(() => registry.declare({ name, codec: intCodec, defaultValue: 0 })).toThrow(
      InvalidOptionNameError,
    )
  })

  it("accepts letters, digits and underscores", () => {
    expect(registry.declare({ name: "Max_Width2", codec: intCodec, defaultValue: 0 }).name).toBe(
      "Max_Width2",
    )
  })

  it("rejects a second declaration under the same name", () => {
    registry.declare({ name: "tabstop", codec: intCodec, defaultValue: 8 })

    expect(() => registry.declare({ name: "tabstop", codec: boolCodec, defaultValue: true })).toThrow(
      OptionAlreadyDeclaredError,
    )
  })

  it("fails lookups of undeclared options", () => {
    expect(() => registry.lookup("nope")).toThrow(UnknownOptionError)
    expect(() => registry.lookup("nope")).toThrow("no such option: 'nope'")
    expect(registry.has("nope")).toBe(false)
  })

  it("describes an option by name", () => {
    registry.declare({
      name: "tabstop",
      codec: intCodec,
      defaultValue: 8,
      docstring: "width of a tab character",
    })

    expect(registry.describe("tabstop")).toEqual({
      name: "tabstop",
      typeName: "int",
      docstring: "width of a tab character",
      hidden: false,
      defaultText: "8",
    })
  })

  it("lists options by name, leaving hidden ones out unless asked", () => {
    registry.declare({ name: "tabstop", codec: intCodec, defaultValue: 8 })
    registry.declare({ name: "autowrap", codec: boolCodec, defaultValue: true })
    registry.declare({
      name: "debug",
      codec: flagsCodec(debugFlagsDesc),
      defaultValue: 0,
      hidden: true,
    })

    expect(registry.list().map((info) => info.name)).toEqual(["autowrap", "tabstop"])
    expect(registry.list({ includeHidden: true }).map((info) => info.name)).toEqual([
      "autowrap",
      "debug",
      "tabstop",
    ])
    expect(registry.describe("debug")).toMatchObject({
      typeName: "flags(hooks|shell|profile|keys)",
      defaultText: "",
      hidden: true,
      docstring: "",
    })
  })

  it("only owns its own declarations", () => {
    const other = new OptionRegistry()
    const foreign = other.declare({ name: "tabstop", codec: intCodec, defaultValue: 8 })
    registry.declare({ name: "tabstop", codec: intCodec, defaultValue: 8 })

    expect(registry.owns(foreign)).toBe(false)
    expect(other.owns(foreign)).toBe(true)
  })
})
