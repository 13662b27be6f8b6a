import type { RawOptionValue } from "../ports/raw-option"
import type { IRawOptions } from "../ports/raw-options"

export class RawOptions implements IRawOptions {
  constructor(
    private readonly data: Readonly<Record<string, RawOptionValue>>,
    private readonly provenance: Readonly<Record<string, string>>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<Record<string, RawOptionValue>> {
    return this.data
  }

  keys(): string[] {
    return Object.keys(this.data)
  }

  get(key: string): RawOptionValue | undefined {
    return Object.hasOwn(this.data, key) ? this.data[key] : undefined
  }

  explain(key: string): string | undefined {
    return Object.hasOwn(this.provenance, key) ? this.provenance[key] : undefined
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }
}
