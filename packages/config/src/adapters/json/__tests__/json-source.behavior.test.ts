import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { JsonSource } from "../json-source"

describe("JsonSource", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "optionkit-json-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("is named after its file", () => {
    expect(new JsonSource({ file: "options.json", required: false }).name).toBe("json:options.json")
  })

  it("loads nothing when an optional file is missing", async () => {
    const source = new JsonSource({ file: "missing.json", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("rejects when a required file is missing", async () => {
    const source = new JsonSource({ file: "missing.json", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })

  it("rejects nested objects", async () => {
    await fs.writeFile(path.join(cwd, "options.json"), JSON.stringify({ ui: { kind: "ncurses" } }))
    const source = new JsonSource({ file: "options.json", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({
      code: "config_validation_failed",
      context: { source: "json:options.json" },
    })
  })

  it("rejects a top-level array", async () => {
    await fs.writeFile(path.join(cwd, "options.json"), "[1, 2]")
    const source = new JsonSource({ file: "options.json", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "config_validation_failed" })
  })

  it("rejects malformed JSON with a SyntaxError", async () => {
    await fs.writeFile(path.join(cwd, "options.json"), "{ tabstop: ")
    const source = new JsonSource({ file: "options.json", required: true, cwd })

    await expect(source.load()).rejects.toBeInstanceOf(SyntaxError)
  })
})
