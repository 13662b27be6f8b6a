import type { OptionCodec } from "../../ports/option-codec"
import { defineCodec } from "../define-codec"
import { escape, split } from "../escape/escape"
import { LIST_SEPARATOR } from "../escape/separators"
import { listTypeName } from "../type-name"

/**
 * Ordered sequence of `element` values joined with `:`.
 *
 * The empty text decodes to the empty list rather than to a one-element
 * list holding an empty value. The flip side is that a list whose only
 * element renders as "" (such as `[""]` for a str-list) encodes to "" and
 * reads back as `[]`.
 */
export function listOf<T>(element: OptionCodec<T>): OptionCodec<readonly T[]> {
  const fromText = (text: string): readonly T[] => {
    if (text === "") return []

    return split(text, LIST_SEPARATOR).map((segment) => element.fromText(segment))
  }

  return defineCodec<readonly T[]>({
    typeName: listTypeName(element.typeName),
    toText: (list) =>
      list.map((item) => escape(element.toText(item), LIST_SEPARATOR)).join(LIST_SEPARATOR),
    fromText,
    add: (current, delta) => {
      const appended = fromText(delta)
      return { value: [...current, ...appended], changed: appended.length > 0 }
    },
    equals: (a, b) => a.length === b.length && a.every((item, i) => element.equals(item, b[i])),
  })
}
