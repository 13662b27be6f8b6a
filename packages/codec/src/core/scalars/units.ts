import type { Brand } from "../../ports/brand"
import { INT32_RANGE, isInRange } from "./integer"
import { newtypeCodec } from "./newtype-codec"

export type LineCount = Brand<number, "LineCount">
export type ColumnCount = Brand<number, "ColumnCount">
export type ByteCount = Brand<number, "ByteCount">

export const isLineCount = (n: number): n is LineCount => isInRange(n, INT32_RANGE)
export const isColumnCount = (n: number): n is ColumnCount => isInRange(n, INT32_RANGE)
export const isByteCount = (n: number): n is ByteCount => isInRange(n, INT32_RANGE) && n >= 0

export const lineCountCodec = newtypeCodec("line-count", isLineCount)
export const columnCountCodec = newtypeCodec("column-count", isColumnCount)
export const byteCountCodec = newtypeCodec("byte-count", isByteCount)
