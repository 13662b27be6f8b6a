/** Lowercase, snake_case identifier such as `invalid_format`. */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: the option name, the offending
 * text, the source a value came from.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected failures caused by input (unparseable option text,
   * unknown option name); `false` for programmer errors such as an invalid
   * separator passed to the escaping engine.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape, used when an error is logged or reported back to
 * whoever edited the option.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
