import type { OptionCodec } from "../../ports/option-codec"
import { defineCodec } from "../define-codec"
import { escape, indexOfUnescaped, unescape } from "../escape/escape"
import { LIST_SEPARATOR } from "../escape/separators"
import { sizeCodec } from "../scalars/size-codec"
import { prefixedListTypeName } from "../type-name"
import { listOf } from "./list-codec"

export type PrefixedList<P, T> = Readonly<{
  prefix: P
  list: readonly T[]
}>

/**
 * List tagged with a counter recording the revision it was last computed
 * against.
 */
export type TimestampedList<T> = PrefixedList<number, T>

/**
 * `<prefix>:<list>`. Decoding splits at the first unescaped `:`; without
 * one the whole text is the prefix and the list is empty. `add` appends to
 * the list and never touches the prefix.
 */
export function prefixedListOf<P, T>(
  prefix: OptionCodec<P>,
  element: OptionCodec<T>,
): OptionCodec<PrefixedList<P, T>> {
  const list = listOf(element)

  return defineCodec<PrefixedList<P, T>>({
    typeName: prefixedListTypeName(prefix.typeName, element.typeName),
    toText: (value) =>
      escape(prefix.toText(value.prefix), LIST_SEPARATOR) + LIST_SEPARATOR + list.toText(value.list),
    fromText: (text) => {
      const at = indexOfUnescaped(text, LIST_SEPARATOR)
      const head = at === -1 ? text : text.slice(0, at)

      return {
        prefix: prefix.fromText(unescape(head, LIST_SEPARATOR)),
        list: at === -1 ? [] : list.fromText(text.slice(at + 1)),
      }
    },
    add: (current, delta) => {
      const { value, changed } = list.add(current.list, delta)
      return { value: { prefix: current.prefix, list: value }, changed }
    },
    equals: (a, b) => prefix.equals(a.prefix, b.prefix) && list.equals(a.list, b.list),
  })
}

export function timestampedListOf<T>(element: OptionCodec<T>): OptionCodec<TimestampedList<T>> {
  return prefixedListOf(sizeCodec, element)
}
