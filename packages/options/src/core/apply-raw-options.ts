import { type ConfigSource, type IRawOptions, loadRawOptions } from "@optionkit/config"
import { InvalidOptionValueError } from "./errors"
import type { OptionScope } from "./option-scope"
import { rawValueToText } from "./raw-value-to-text"

export type ApplyReport = {
  /** Options set, in the order they were applied. */
  applied: string[]
  /** Keys no option is declared for. */
  unknown: string[]
}

/**
 * Set every raw value on `scope` through its option's codec.
 *
 * @throws InvalidOptionValueError when a codec rejects a value; options
 * applied before it stay set
 */
export function applyRawOptions(scope: OptionScope, raw: IRawOptions): ApplyReport {
  const report: ApplyReport = { applied: [], unknown: [] }

  for (const key of raw.keys()) {
    const value = raw.get(key)
    if (value === undefined) continue

    const source = raw.explain(key) ?? "unknown"

    if (!scope.registry.has(key)) {
      scope.logger.warn("unknown option in config", { scope: scope.name, option: key, source })
      report.unknown.push(key)
      continue
    }

    try {
      scope.setText(key, rawValueToText(value))
    } catch (err) {
      scope.logger.error("rejected option value", { scope: scope.name, option: key, source, err })
      throw new InvalidOptionValueError(
        `invalid value for option '${key}' from ${source}`,
        { option: key, source },
        err,
      )
    }

    report.applied.push(key)
  }

  return report
}

export type LoadOptionsOptions = {
  scope: OptionScope
  sources?: ConfigSource[]
}

export async function loadOptions({ scope, sources }: LoadOptionsOptions): Promise<ApplyReport> {
  const raw = await loadRawOptions({ sources })

  return applyRawOptions(scope, raw)
}
