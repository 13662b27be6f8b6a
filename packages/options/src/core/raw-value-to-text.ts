import { listOf, strCodec } from "@optionkit/codec"
import type { RawOptionValue } from "@optionkit/config"

const strList = listOf(strCodec)

/**
 * Option text for a value from a config source. Arrays use the str-list
 * encoding, so each element is escaped against `:`.
 */
export function rawValueToText(value: RawOptionValue): string {
  if (Array.isArray(value)) return strList.toText(value.map((item) => String(item)))

  return String(value)
}
