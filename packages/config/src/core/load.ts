import { BaseError } from "@optionkit/errors"
import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { RawOptionValue } from "../ports/raw-option"
import type { IRawOptions } from "../ports/raw-options"
import type { ConfigSource } from "../ports/source"
import { rawOptionRecordSchema } from "./raw-option-schema"
import { RawOptions } from "./raw-options"

export const DEFAULT_ENV_PREFIX = "OPTIONKIT_"

export type LoadRawOptionsOptions = {
  /** Defaults to the environment, filtered by {@link DEFAULT_ENV_PREFIX}. */
  sources?: ConfigSource[]
}

export async function loadRawOptions({
  sources,
}: LoadRawOptionsOptions = {}): Promise<IRawOptions> {
  const merged: Record<string, RawOptionValue> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource({ prefix: DEFAULT_ENV_PREFIX })]

  for (const source of resolvedSources) {
    const result = rawOptionRecordSchema.safeParse(await source.load())

    if (!result.success) {
      throw new BaseError(
        `Option source ${source.name} is invalid:\n${z.prettifyError(result.error)}`,
        { code: "config_validation_failed", context: { source: source.name } },
      )
    }

    for (const [key, value] of Object.entries(result.data)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  return new RawOptions(merged, provenance)
}
