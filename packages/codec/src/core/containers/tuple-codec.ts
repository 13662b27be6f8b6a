import type { OptionCodec } from "../../ports/option-codec"
import { defineCodec } from "../define-codec"
import { InvalidFormatError } from "../errors"
import { escape, split } from "../escape/escape"
import { TUPLE_SEPARATOR } from "../escape/separators"
import { tupleTypeName } from "../type-name"

export type TupleValues<Cs extends readonly OptionCodec<unknown>[]> = {
  -readonly [I in keyof Cs]: Cs[I] extends OptionCodec<infer T> ? T : never
}

/**
 * Fixed-arity, heterogeneous sequence joined with `|`, each field escaped
 * against `|`. Decoding requires exactly one segment per element codec.
 *
 * @example
 * ```ts
 * const codec = tupleOf(intCodec, strCodec, boolCodec)
 *
 * codec.toText([1, "a|b", true]) // "1|a\\|b|true"
 * codec.fromText("1|2")          // throws "not enough elements in tuple"
 * ```
 */
/** At least one element: the empty text already splits into one segment. */
export type TupleCodecs = readonly [OptionCodec<unknown>, ...OptionCodec<unknown>[]]

export function tupleOf<const Cs extends TupleCodecs>(
  ...elements: Cs
): OptionCodec<TupleValues<Cs>> {
  const decode = (text: string): unknown[] => {
    const segments = split(text, TUPLE_SEPARATOR)

    if (segments.length < elements.length) {
      throw new InvalidFormatError("not enough elements in tuple", { text })
    }
    if (segments.length > elements.length) {
      throw new InvalidFormatError("too many elements in tuple", { text })
    }

    return elements.map((codec, i) => codec.fromText(segments[i]))
  }

  return defineCodec<TupleValues<Cs>>({
    typeName: tupleTypeName(elements.map((codec) => codec.typeName)),
    toText: (tuple) =>
      elements
        .map((codec, i) => escape(codec.toText(tuple[i]), TUPLE_SEPARATOR))
        .join(TUPLE_SEPARATOR),
    // one value per element codec, in order; the mapped tuple type cannot be
    // inferred from Array.prototype.map
    fromText: (text) => decode(text) as TupleValues<Cs>,
    equals: (a, b) => elements.every((codec, i) => codec.equals(a[i], b[i])),
  })
}
