import type { EnumDescTable } from "../ports/enum-desc"

/*
 * Type names are derived from element type names, so a nested codec
 * describes itself: listOf(mapOf(strCodec, intCodec)) is
 * "str-to-int-map-list".
 */

export function listTypeName(element: string): string {
  return `${element}-list`
}

export function mapTypeName(key: string, value: string): string {
  return `${key}-to-${value}-map`
}

export function tupleTypeName(elements: readonly string[]): string {
  return `${elements.join("-")}-tuple`
}

export function prefixedListTypeName(prefix: string, element: string): string {
  return `${prefix}-prefixed-${element}-list`
}

export type EnumKind = "enum" | "flags"

export function enumTypeName<V>(kind: EnumKind, desc: EnumDescTable<V>): string {
  return `${kind}(${desc.map((d) => d.name).join("|")})`
}
