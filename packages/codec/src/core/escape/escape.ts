import { BaseError } from "@optionkit/errors"
import { ESCAPE_CHAR } from "./separators"

function assertSingleChar(value: string, role: string): void {
  if (value.length !== 1) {
    throw new BaseError(`${role} must be a single character`, {
      code: "invalid_separator",
      context: { [role]: value },
      isOperational: false,
    })
  }
}

/**
 * Prefix every `reserved` character, and every `escapeChar` itself, with
 * `escapeChar`.
 *
 * @example
 * ```ts
 * escape("a:b\\c", ":") // "a\\:b\\\\c"
 * ```
 */
export function escape(text: string, reserved: string, escapeChar: string = ESCAPE_CHAR): string {
  assertSingleChar(reserved, "reserved")
  assertSingleChar(escapeChar, "escapeChar")

  let out = ""
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i)
    if (ch === reserved || ch === escapeChar) out += escapeChar
    out += ch
  }
  return out
}

/**
 * Split on every unescaped `separator`, dropping one `escapeChar` in front
 * of an escaped separator or escape char. Any other escape is kept as is.
 *
 * Always yields at least one segment: `split("", ":")` is `[""]`.
 */
export function split(text: string, separator: string, escapeChar: string = ESCAPE_CHAR): string[] {
  assertSingleChar(separator, "separator")
  assertSingleChar(escapeChar, "escapeChar")

  const segments: string[] = []
  let current = ""

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i)

    if (ch === escapeChar) {
      const next = text.charAt(i + 1)
      if (next === separator || next === escapeChar) {
        current += next
        i++
      } else {
        current += ch
      }
    } else if (ch === separator) {
      segments.push(current)
      current = ""
    } else {
      current += ch
    }
  }

  segments.push(current)
  return segments
}

/**
 * Inverse of {@link escape} for text that holds no unescaped `reserved`.
 */
export function unescape(text: string, reserved: string, escapeChar: string = ESCAPE_CHAR): string {
  return split(text, reserved, escapeChar).join(reserved)
}

/**
 * Index of the first `separator` not preceded by an escape, or -1.
 */
export function indexOfUnescaped(
  text: string,
  separator: string,
  escapeChar: string = ESCAPE_CHAR,
): number {
  assertSingleChar(separator, "separator")
  assertSingleChar(escapeChar, "escapeChar")

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i)
    if (ch === escapeChar) {
      i++
    } else if (ch === separator) {
      return i
    }
  }
  return -1
}
