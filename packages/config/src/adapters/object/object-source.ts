import type { RawOptionRecord } from "../../ports/raw-option"
import type { ConfigSource } from "../../ports/source"

export class ObjectSource implements ConfigSource {
  constructor(
    private readonly obj: RawOptionRecord,
    readonly name = "object:overrides",
  ) {}

  async load(): Promise<RawOptionRecord> {
    return { ...this.obj }
  }
}
