/**
 * Result of merging a textual delta into an option value.
 */
export type OptionUpdate<T> = Readonly<{
  value: T
  /** `false` when the delta was a no-op (zero, empty list, no flags) */
  changed: boolean
}>

/**
 * OptionCodec converts one value shape to and from its canonical option
 * text, and optionally merges a textual delta into an existing value.
 *
 * @remarks
 * Codecs are stateless and pure. Values are never mutated: `fromText`
 * always builds a fresh value and `add` returns the merged one, so a
 * failing `add` leaves the caller's value as it was.
 *
 * Container codecs (`listOf`, `mapOf`, `tupleOf`, `prefixedListOf`) are
 * built from element codecs and escape each element's text against their
 * own separator.
 *
 * @example
 * ```ts
 * const codec = listOf(intCodec)
 *
 * codec.typeName           // "int-list"
 * codec.toText([1, 2])     // "1:2"
 * codec.fromText("1:2:3")  // [1, 2, 3]
 * codec.add([1], "2:3")    // { value: [1, 2, 3], changed: true }
 * ```
 */
export interface OptionCodec<T> {
  /** Human-readable type descriptor, e.g. `int-to-bool-map` */
  readonly typeName: string

  /** Render a value as canonical text. Does not fail for a valid value. */
  toText(value: T): string

  /**
   * Parse text into a value. The whole text must be consumed.
   *
   * @throws InvalidFormatError
   */
  fromText(text: string): T

  /**
   * Merge `delta` into `current` (numeric addition, list append, flag union).
   *
   * @throws UnsupportedOperationError for types without merge semantics
   * @throws InvalidFormatError when `delta` does not parse
   */
  add(current: T, delta: string): OptionUpdate<T>

  equals(a: T, b: T): boolean
}

/** Value type carried by a codec. */
export type CodecValue<C> = C extends OptionCodec<infer T> ? T : never
