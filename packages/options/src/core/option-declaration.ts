import type { OptionCodec } from "@optionkit/codec"
import type { OptionInfo, OptionSpec, RegisteredOption } from "../ports/option"
import type { ScopeNode } from "../ports/scope-node"

/**
 * A typed option. Values live here, keyed by scope, so a scope never holds
 * values it cannot type; reads walk the parent chain and fall back to the
 * default.
 */
export class OptionDeclaration<T> implements RegisteredOption {
  readonly name: string
  readonly codec: OptionCodec<T>
  readonly defaultValue: T
  readonly docstring: string
  readonly hidden: boolean

  // Boxed so that `undefined` can be a legitimate option value.
  private readonly values = new WeakMap<ScopeNode, { value: T }>()

  constructor(spec: OptionSpec<T>) {
    this.name = spec.name
    this.codec = spec.codec
    this.defaultValue = spec.defaultValue
    this.docstring = spec.docstring ?? ""
    this.hidden = spec.hidden ?? false
  }

  get typeName(): string {
    return this.codec.typeName
  }

  valueIn(scope: ScopeNode): T {
    for (let node: ScopeNode | undefined = scope; node; node = node.parent) {
      const stored = this.values.get(node)
      if (stored) return stored.value
    }

    return this.defaultValue
  }

  isSetIn(scope: ScopeNode): boolean {
    return this.values.has(scope)
  }

  store(scope: ScopeNode, value: T): boolean {
    const previous = this.valueIn(scope)
    this.values.set(scope, { value })

    return !this.codec.equals(previous, value)
  }

  getText(scope: ScopeNode): string {
    return this.codec.toText(this.valueIn(scope))
  }

  setText(scope: ScopeNode, text: string): boolean {
    return this.store(scope, this.codec.fromText(text))
  }

  addText(scope: ScopeNode, text: string): boolean {
    const update = this.codec.add(this.valueIn(scope), text)
    if (!update.changed) return false

    return this.store(scope, update.value)
  }

  unset(scope: ScopeNode): boolean {
    const stored = this.values.get(scope)
    if (!stored) return false

    this.values.delete(scope)
    return !this.codec.equals(stored.value, this.valueIn(scope))
  }

  describe(): OptionInfo {
    return {
      name: this.name,
      typeName: this.typeName,
      docstring: this.docstring,
      hidden: this.hidden,
      defaultText: this.codec.toText(this.defaultValue),
    }
  }
}
