import type { RawOptionRecord } from "./raw-option"

/**
 * A source of raw option values.
 *
 * A source only loads values. It does not know which options exist or how
 * their text is parsed; the option store does both. Sources are applied in
 * order and later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Name used for provenance, e.g. "env", "dotenv:.options",
   * "json:options.json".
   */
  readonly name: string

  load(): Promise<RawOptionRecord>
}
