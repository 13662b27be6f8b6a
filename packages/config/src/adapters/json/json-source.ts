import { BaseError } from "@optionkit/errors"
import { z } from "zod"
import { rawOptionRecordSchema } from "../../core/raw-option-schema"
import { readOptionalFile } from "../../core/read-optional-file"
import type { RawOptionRecord } from "../../ports/raw-option"
import type { ConfigSource } from "../../ports/source"

export type JsonSourceOptions = {
  /**
   * Path to the JSON file, absolute or relative to `cwd`. The file holds a
   * flat object of option names to strings, numbers, booleans or arrays of
   * those.
   *
   * @example "options.json", "./config/options.json"
   */
  file: string

  /**
   * - `true`: throws if the file is missing.
   * - `false`: a missing file loads as no options.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${this.opts.file}`
  }

  async load(): Promise<RawOptionRecord> {
    const content = await readOptionalFile(this.opts)
    if (content === undefined) return {}

    const parsed: unknown = JSON.parse(content)
    const result = rawOptionRecordSchema.safeParse(parsed)

    if (!result.success) {
      throw new BaseError(`Option file ${this.opts.file} is invalid:\n${z.prettifyError(result.error)}`, {
        code: "config_validation_failed",
        context: { source: this.name },
      })
    }

    return result.data
  }
}
