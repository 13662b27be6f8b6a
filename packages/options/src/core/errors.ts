import { BaseError, type ErrorContext } from "@optionkit/errors"

export class InvalidOptionNameError extends BaseError<"invalid_option_name"> {
  constructor(name: string) {
    super(`invalid option name '${name}'`, {
      code: "invalid_option_name",
      context: { option: name },
    })
  }
}

export class OptionAlreadyDeclaredError extends BaseError<"option_already_declared"> {
  constructor(name: string) {
    super(`option '${name}' already declared`, {
      code: "option_already_declared",
      context: { option: name },
    })
  }
}

export class UnknownOptionError extends BaseError<"unknown_option"> {
  constructor(name: string) {
    super(`no such option: '${name}'`, {
      code: "unknown_option",
      context: { option: name },
    })
  }
}

/** A config source supplied text the option's codec rejected. */
export class InvalidOptionValueError extends BaseError<"invalid_option_value"> {
  constructor(message: string, context: ErrorContext, cause: unknown) {
    super(message, { code: "invalid_option_value", context, cause })
  }
}
