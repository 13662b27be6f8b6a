export type RawOptionScalar = string | number | boolean

/**
 * An option value as a source delivers it, before any codec has seen it.
 * Env and dotenv sources only produce strings; JSON and object sources may
 * also produce numbers, booleans and flat arrays, which the option store
 * turns into option text.
 */
export type RawOptionValue = RawOptionScalar | RawOptionScalar[]

/** `undefined` means "not provided by this source". */
export type RawOptionRecord = Record<string, RawOptionValue | undefined>
