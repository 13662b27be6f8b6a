/**
 * Map an environment-style key to an option name: strip `prefix` and
 * lowercase the rest (`OPTIONKIT_TABSTOP` -> `tabstop`). Returns
 * `undefined` for keys without the prefix.
 */
export function normalizeKey(key: string, prefix?: string): string | undefined {
  if (!prefix) return key.toLowerCase()
  if (!key.startsWith(prefix)) return undefined

  const rest = key.slice(prefix.length)
  return rest ? rest.toLowerCase() : undefined
}
