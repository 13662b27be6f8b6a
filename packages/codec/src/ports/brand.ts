declare const brand: unique symbol

/**
 * Nominal wrapper over a primitive: `Brand<number, "LineCount">` is a number
 * that is not interchangeable with a `Brand<number, "ByteCount">`.
 */
export type Brand<T, B extends string> = T & { readonly [brand]: B }
