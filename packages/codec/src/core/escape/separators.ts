/** Joins list elements and map entries. */
export const LIST_SEPARATOR = ":"

/** Separates a map key from its value inside one list element. */
export const KEY_VALUE_SEPARATOR = "="

/** Joins tuple fields; distinct from the list separator so tuples nest in lists. */
export const TUPLE_SEPARATOR = "|"

/** Joins active flag names. Not escaped: flag names never contain it. */
export const FLAG_SEPARATOR = "|"

/** Separates line and column of a coordinate. */
export const COORD_SEPARATOR = ","

export const ESCAPE_CHAR = "\\"
