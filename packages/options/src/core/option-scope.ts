import { createNullLogger, type Logger } from "@optionkit/logger"
import type { RegisteredOption } from "../ports/option"
import type { OptionChangeListener } from "../ports/option-change"
import type { ScopeNode } from "../ports/scope-node"
import { UnknownOptionError } from "./errors"
import type { OptionDeclaration } from "./option-declaration"
import type { OptionRegistry } from "./option-registry"

export type OptionScopeOptions = {
  /** @default "global" */
  name?: string
  logger?: Logger
}

/**
 * A level in the option hierarchy (global, then buffer, then window).
 *
 * Reads fall back to the parent scope and finally to the declared default.
 * Writes are local. A change is reported to this scope's listeners, then to
 * every descendant that does not set the option itself.
 *
 * @example
 * ```ts
 * const registry = new OptionRegistry()
 * const tabstop = registry.declare({ name: "tabstop", codec: intCodec, defaultValue: 8 })
 *
 * const global = new OptionScope(registry)
 * const buffer = global.createChild("buffer:main.ts")
 *
 * global.setText("tabstop", "4")
 * buffer.get(tabstop) // 4
 * ```
 */
export class OptionScope implements ScopeNode {
  readonly name: string
  readonly logger: Logger
  private readonly children = new Set<OptionScope>()
  private readonly listeners = new Set<OptionChangeListener>()

  constructor(
    readonly registry: OptionRegistry,
    options: OptionScopeOptions = {},
    readonly parent: OptionScope | undefined = undefined,
  ) {
    this.name = options.name ?? "global"
    this.logger = options.logger ?? createNullLogger()
    parent?.children.add(this)
  }

  createChild(name: string): OptionScope {
    return new OptionScope(this.registry, { name, logger: this.logger }, this)
  }

  /** Detach from the parent; the scope stops receiving inherited changes. */
  dispose(): void {
    this.parent?.children.delete(this)
    this.listeners.clear()
  }

  get<T>(option: OptionDeclaration<T>): T {
    return this.own(option).valueIn(this)
  }

  set<T>(option: OptionDeclaration<T>, value: T): void {
    if (this.own(option).store(this, value)) this.changed(option)
  }

  getText(name: string): string {
    return this.registry.lookup(name).getText(this)
  }

  /**
   * @throws InvalidFormatError when `text` does not parse; the option keeps
   * its value
   */
  setText(name: string, text: string): void {
    const option = this.registry.lookup(name)
    if (option.setText(this, text)) this.changed(option)
  }

  /**
   * Merge `text` into the effective value and store the result in this
   * scope.
   *
   * @throws UnsupportedOperationError for options without add semantics
   */
  add(name: string, text: string): void {
    const option = this.registry.lookup(name)
    if (option.addText(this, text)) this.changed(option)
  }

  unset(name: string): void {
    const option = this.registry.lookup(name)
    if (option.unset(this)) this.changed(option)
  }

  isSet(name: string): boolean {
    return this.registry.lookup(name).isSetIn(this)
  }

  onChange(listener: OptionChangeListener): () => void {
    this.listeners.add(listener)

    return () => {
      this.listeners.delete(listener)
    }
  }

  private own<T>(option: OptionDeclaration<T>): OptionDeclaration<T> {
    if (!this.registry.owns(option)) throw new UnknownOptionError(option.name)

    return option
  }

  private changed(option: RegisteredOption): void {
    const text = option.getText(this)
    this.logger.debug("option changed", { scope: this.name, option: option.name, text })
    this.notify(option, text, this.name)
  }

  private notify(option: RegisteredOption, text: string, origin: string): void {
    for (const listener of this.listeners) {
      listener({ option: option.name, scope: this.name, origin, text })
    }

    for (const child of this.children) {
      if (!option.isSetIn(child)) child.notify(option, text, origin)
    }
  }
}
