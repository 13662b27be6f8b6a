import { InvalidFormatError } from "../errors"

export type IntegerRange = Readonly<{
  typeName: string
  min: number
  max: number
}>

export const INT32_RANGE: IntegerRange = {
  typeName: "int",
  min: -(2 ** 31),
  max: 2 ** 31 - 1,
}

const DECIMAL = /^[+-]?\d+$/

/**
 * Locale-independent base-10 parse. No whitespace, no radix prefixes, no
 * exponent.
 */
export function parseInteger(text: string, range: IntegerRange = INT32_RANGE): number {
  if (!DECIMAL.test(text)) {
    throw new InvalidFormatError(`'${text}' is not a number`, { text })
  }

  const value = Number(text)

  if (!isInRange(value, range)) {
    throw new InvalidFormatError(`'${text}' is out of range for ${range.typeName}`, {
      text,
      typeName: range.typeName,
    })
  }

  // Number("-0") is -0; canonical text has no negative zero
  return value === 0 ? 0 : value
}

export function isInRange(value: number, range: IntegerRange): boolean {
  return Number.isSafeInteger(value) && value >= range.min && value <= range.max
}

/**
 * `current` plus the integer in `delta`, kept inside `range` so the sum
 * reads back through the same codec.
 */
export function addInteger(
  current: number,
  delta: string,
  range: IntegerRange = INT32_RANGE,
): { sum: number; amount: number } {
  const amount = parseInteger(delta, INT32_RANGE)
  const sum = current + amount

  if (!isInRange(sum, range)) {
    throw new InvalidFormatError(`adding '${delta}' is out of range for ${range.typeName}`, {
      text: delta,
      typeName: range.typeName,
    })
  }

  return { sum, amount }
}

export function formatInteger(value: number): string {
  return value.toString(10)
}
