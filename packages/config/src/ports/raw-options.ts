import type { RawOptionValue } from "./raw-option"

/**
 * Merged, validated raw option values together with where each one came
 * from.
 *
 * @example
 * ```ts
 * const raw = await loadRawOptions({
 *   sources: [new JsonSource({ file: "options.json", required: false }), new EnvSource({ prefix: "OPTIONKIT_" })],
 * })
 *
 * raw.get("tabstop")     // "4"
 * raw.explain("tabstop") // "env"
 * ```
 */
export interface IRawOptions {
  readonly value: Readonly<Record<string, RawOptionValue>>

  keys(): string[]

  get(key: string): RawOptionValue | undefined

  /**
   * Name of the source that provided the final value for `key`, or
   * `undefined` when no source provided it.
   */
  explain(key: string): string | undefined

  /** Names of the sources that provided at least one final value. */
  sourcesUsed(): string[]
}
