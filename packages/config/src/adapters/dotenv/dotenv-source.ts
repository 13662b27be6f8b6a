import { parse } from "dotenv"
import { normalizeKey } from "../../core/normalize-key"
import { readOptionalFile } from "../../core/read-optional-file"
import type { RawOptionRecord } from "../../ports/raw-option"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Path to the dotenv file, absolute or relative to `cwd`.
   *
   * @example ".options", "./config/.options.local"
   */
  file: string

  /**
   * - `true`: throws if the file is missing.
   * - `false`: a missing file loads as no options.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /** Same filtering as {@link EnvSource}; keys are lowercased either way. */
  prefix?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<RawOptionRecord> {
    const content = await readOptionalFile(this.opts)
    if (content === undefined) return {}

    const result: RawOptionRecord = {}

    for (const [key, value] of Object.entries(parse(content))) {
      const name = normalizeKey(key, this.opts.prefix)

      if (name !== undefined) result[name] = value
    }

    return result
  }
}
