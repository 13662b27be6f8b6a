export {
  type ApplyReport,
  applyRawOptions,
  loadOptions,
  type LoadOptionsOptions,
} from "./core/apply-raw-options"
export {
  InvalidOptionNameError,
  InvalidOptionValueError,
  OptionAlreadyDeclaredError,
  UnknownOptionError,
} from "./core/errors"
export { OptionDeclaration } from "./core/option-declaration"
export { type ListOptions, OptionRegistry } from "./core/option-registry"
export { OptionScope, type OptionScopeOptions } from "./core/option-scope"
export { rawValueToText } from "./core/raw-value-to-text"
export type { OptionInfo, OptionSpec, RegisteredOption } from "./ports/option"
export type { OptionChange, OptionChangeListener } from "./ports/option-change"
export type { ScopeNode } from "./ports/scope-node"
