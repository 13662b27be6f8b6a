import type { OptionCodec } from "@optionkit/codec"
import type { ScopeNode } from "./scope-node"

export type OptionSpec<T> = {
  /** Letters, digits and underscores only. */
  name: string
  codec: OptionCodec<T>
  defaultValue: T
  docstring?: string
  /** Hidden options are left out of `list()` unless asked for. */
  hidden?: boolean
}

export type OptionInfo = Readonly<{
  name: string
  typeName: string
  docstring: string
  hidden: boolean
  defaultText: string
}>

/**
 * A declared option with its value type erased. Everything goes through
 * option text, which is what config sources and command lines deal in.
 *
 * The mutating methods return whether the effective value in `scope`
 * changed.
 */
export interface RegisteredOption {
  readonly name: string
  readonly typeName: string

  isSetIn(scope: ScopeNode): boolean
  getText(scope: ScopeNode): string
  setText(scope: ScopeNode, text: string): boolean
  addText(scope: ScopeNode, text: string): boolean
  unset(scope: ScopeNode): boolean
  describe(): OptionInfo
}
