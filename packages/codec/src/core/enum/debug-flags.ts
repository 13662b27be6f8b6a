import type { EnumDescTable } from "../../ports/enum-desc"

export const DebugFlags = {
  None: 0,
  Hooks: 1 << 0,
  Shell: 1 << 1,
  Profile: 1 << 2,
  Keys: 1 << 3,
} as const

export type DebugFlag = (typeof DebugFlags)[keyof typeof DebugFlags]

export const debugFlagsDesc: EnumDescTable<number> = Object.freeze([
  Object.freeze({ value: DebugFlags.Hooks, name: "hooks" }),
  Object.freeze({ value: DebugFlags.Shell, name: "shell" }),
  Object.freeze({ value: DebugFlags.Profile, name: "profile" }),
  Object.freeze({ value: DebugFlags.Keys, name: "keys" }),
])
