import { z } from "zod"

export const rawOptionScalarSchema = z.union([z.string(), z.number(), z.boolean()])

export const rawOptionValueSchema = z.union([
  rawOptionScalarSchema,
  z.array(rawOptionScalarSchema),
])

export const rawOptionRecordSchema = z.record(z.string(), rawOptionValueSchema.optional())
