import type { OptionCodec } from "../../ports/option-codec"
import { defineCodec } from "../define-codec"
import { InvalidFormatError } from "../errors"
import { escape, split } from "../escape/escape"
import { KEY_VALUE_SEPARATOR, LIST_SEPARATOR } from "../escape/separators"
import { mapTypeName } from "../type-name"

/**
 * `key=value` entries joined with `:`. Key and value are escaped against
 * `=`, then the whole entry against `:`.
 *
 * Entry order follows the map's iteration order and carries no meaning.
 * On decode a repeated key keeps its last value. Keys are compared with
 * `Map` semantics, so `K` should be a primitive.
 *
 * No `add`: merging maps has no defined semantics.
 */
export function mapOf<K, V>(
  key: OptionCodec<K>,
  value: OptionCodec<V>,
): OptionCodec<ReadonlyMap<K, V>> {
  return defineCodec<ReadonlyMap<K, V>>({
    typeName: mapTypeName(key.typeName, value.typeName),
    toText: (map) => {
      const entries: string[] = []
      for (const [k, v] of map) {
        const entry =
          escape(key.toText(k), KEY_VALUE_SEPARATOR) +
          KEY_VALUE_SEPARATOR +
          escape(value.toText(v), KEY_VALUE_SEPARATOR)
        entries.push(escape(entry, LIST_SEPARATOR))
      }
      return entries.join(LIST_SEPARATOR)
    },
    fromText: (text) => {
      const map = new Map<K, V>()
      if (text === "") return map

      for (const entry of split(text, LIST_SEPARATOR)) {
        const pair = split(entry, KEY_VALUE_SEPARATOR)
        if (pair.length !== 2) {
          throw new InvalidFormatError("map option expects key=value", { text: entry })
        }
        const [k, v] = pair
        map.set(key.fromText(k), value.fromText(v))
      }
      return map
    },
    equals: (a, b) => {
      if (a.size !== b.size) return false
      for (const [k, v] of a) {
        if (!b.has(k)) return false
        const other = b.get(k)
        if (other === undefined && v !== undefined) return false
        if (other !== undefined && !value.equals(v, other)) return false
      }
      return true
    },
  })
}
