import type { OptionCodec, OptionUpdate } from "../ports/option-codec"
import { UnsupportedOperationError } from "./errors"

export type CodecDefinition<T> = {
  typeName: string
  toText(value: T): string
  fromText(text: string): T
  /** Omit for types without merge semantics; `add` then always throws. */
  add?(current: T, delta: string): OptionUpdate<T>
  /** Defaults to `Object.is`, which is right for primitives only. */
  equals?(a: T, b: T): boolean
}

/**
 * Build an {@link OptionCodec}, filling in the universal `add` rejection
 * and identity equality for whatever the definition leaves out.
 */
export function defineCodec<T>(definition: CodecDefinition<T>): OptionCodec<T> {
  const { typeName } = definition

  return {
    typeName,
    toText: (value) => definition.toText(value),
    fromText: (text) => definition.fromText(text),
    add: (current, delta) => {
      if (!definition.add) {
        throw new UnsupportedOperationError(
          "no add operation supported for this option type",
          { typeName },
        )
      }
      return definition.add(current, delta)
    },
    equals: (a, b) => (definition.equals ? definition.equals(a, b) : Object.is(a, b)),
  }
}
