import { normalizeKey } from "../../core/normalize-key"
import type { RawOptionRecord } from "../../ports/raw-option"
import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with `prefix` are kept, with the prefix removed. */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix?: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<RawOptionRecord> {
    const filtered: RawOptionRecord = {}

    for (const [key, value] of Object.entries(this.env)) {
      const name = normalizeKey(key, this.prefix)

      if (name !== undefined) filtered[name] = value
    }

    return filtered
  }
}
