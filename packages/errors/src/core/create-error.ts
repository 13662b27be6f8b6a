import type { ErrorCode } from "../ports/error"
import { BaseError, type BaseErrorOptions } from "./base-error"

/**
 * Create a BaseError without declaring a subclass.
 *
 * @example
 * ```ts
 * throw createError("unknown_option", "no such option: tabstop", {
 *   context: { option: "tabstop" },
 * })
 * ```
 */
export function createError<C extends ErrorCode>(
  code: C,
  message: string,
  options?: Omit<BaseErrorOptions<C>, "code">,
): BaseError<C> {
  return new BaseError(message, { code, ...options })
}
