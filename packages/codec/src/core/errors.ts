import { BaseError, type ErrorContext } from "@optionkit/errors"

/**
 * Text does not parse into the target shape: wrong segment count, an
 * unparseable scalar, an unknown enum or boolean word.
 */
export class InvalidFormatError extends BaseError<"invalid_format"> {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, { code: "invalid_format", context, cause })
  }
}

/**
 * `add` was requested on a type that has no merge semantics.
 */
export class UnsupportedOperationError extends BaseError<"unsupported_operation"> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: "unsupported_operation", context })
  }
}
