import type { OptionInfo, OptionSpec, RegisteredOption } from "../ports/option"
import { InvalidOptionNameError, OptionAlreadyDeclaredError, UnknownOptionError } from "./errors"
import { OptionDeclaration } from "./option-declaration"

const OPTION_NAME = /^[a-zA-Z0-9_]+$/

export type ListOptions = {
  /** @default false */
  includeHidden?: boolean
}

export class OptionRegistry {
  private readonly options = new Map<string, RegisteredOption>()

  declare<T>(spec: OptionSpec<T>): OptionDeclaration<T> {
    if (!OPTION_NAME.test(spec.name)) throw new InvalidOptionNameError(spec.name)
    if (this.options.has(spec.name)) throw new OptionAlreadyDeclaredError(spec.name)

    const declaration = new OptionDeclaration(spec)
    this.options.set(spec.name, declaration)

    return declaration
  }

  has(name: string): boolean {
    return this.options.has(name)
  }

  /** @throws UnknownOptionError */
  lookup(name: string): RegisteredOption {
    const option = this.options.get(name)
    if (!option) throw new UnknownOptionError(name)

    return option
  }

  /** Whether `option` is the very declaration registered under its name. */
  owns(option: RegisteredOption): boolean {
    return this.options.get(option.name) === option
  }

  describe(name: string): OptionInfo {
    return this.lookup(name).describe()
  }

  /** Sorted by name. */
  list({ includeHidden = false }: ListOptions = {}): OptionInfo[] {
    return [...this.options.values()]
      .map((option) => option.describe())
      .filter((info) => includeHidden || !info.hidden)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }
}
