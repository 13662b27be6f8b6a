/** The part of a scope option values are keyed by. */
export interface ScopeNode {
  readonly name: string
  readonly parent: ScopeNode | undefined
}
