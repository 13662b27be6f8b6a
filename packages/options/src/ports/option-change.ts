export type OptionChange = Readonly<{
  option: string
  /** Scope the listener is attached to. */
  scope: string
  /** Scope the value was written in; an ancestor when inherited. */
  origin: string
  /** New effective value, as option text. */
  text: string
}>

export type OptionChangeListener = (change: OptionChange) => void
