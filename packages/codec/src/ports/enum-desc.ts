/**
 * One legal member of an enum or flag type and its canonical lowercase name.
 */
export type EnumDesc<V> = Readonly<{
  value: V
  name: string
}>

/**
 * Ordered descriptor table. Order defines how names are listed in type
 * names and how active flags are rendered.
 */
export type EnumDescTable<V> = readonly EnumDesc<V>[]
