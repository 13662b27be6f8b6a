import { defineCodec } from "../define-codec"
import { InvalidFormatError } from "../errors"
import { COORD_SEPARATOR } from "../escape/separators"
import { formatInteger, parseInteger } from "../scalars/integer"

export type LineAndColumn = Readonly<{
  line: number
  column: number
}>

/**
 * `<line>,<column>`. The separator is never escaped since both fields are
 * integers.
 */
export const coordCodec = defineCodec<LineAndColumn>({
  typeName: "coord",
  toText: ({ line, column }) => `${formatInteger(line)}${COORD_SEPARATOR}${formatInteger(column)}`,
  fromText: (text) => {
    const parts = text.split(COORD_SEPARATOR)
    const [line, column] = parts

    if (parts.length !== 2 || line === undefined || column === undefined) {
      throw new InvalidFormatError("expected <line>,<column>", { text })
    }

    return { line: parseInteger(line), column: parseInteger(column) }
  },
  equals: (a, b) => a.line === b.line && a.column === b.column,
})
