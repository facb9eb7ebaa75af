import { BaseError } from "@recall/errors"

export type FormatErrorCode = "format_error"

/**
 * Stored bytes could not be converted to the requested type.
 */
export class FormatError extends BaseError<FormatErrorCode> {
  static absent(expected: string): FormatError {
    return new FormatError(`Expected ${expected}, but the key holds no value`, {
      code: "format_error",
      context: { expected },
    })
  }

  static invalidText(cause: unknown): FormatError {
    return new FormatError("Value is not valid UTF-8 text", {
      code: "format_error",
      context: { expected: "text" },
      cause,
    })
  }

  static invalidInteger(text: string): FormatError {
    return new FormatError(`Value is not a base-10 integer: ${JSON.stringify(text)}`, {
      code: "format_error",
      context: { expected: "integer", text },
    })
  }

  static unsafeInteger(text: string): FormatError {
    return new FormatError(`Integer is outside the safe range: ${text}`, {
      code: "format_error",
      context: { expected: "integer", text },
    })
  }
}
