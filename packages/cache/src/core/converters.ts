import type { Converter } from "../ports/converter"
import { FormatError } from "./errors/format-error"

const decoder = new TextDecoder("utf-8", { fatal: true })

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/

function decodeText(raw: Uint8Array): string {
  try {
    return decoder.decode(raw)
  } catch (err) {
    throw FormatError.invalidText(err)
  }
}

/**
 * Decodes stored bytes as UTF-8 text.
 */
export const utf8Text: Converter<string> = (raw) => {
  if (raw === null) throw FormatError.absent("text")

  return decodeText(raw)
}

/**
 * Parses stored bytes as a base-10 integer.
 *
 * Accepts surrounding whitespace and an optional sign; rejects fractions,
 * exponents and values outside the safe integer range.
 */
export const base10Integer: Converter<number> = (raw) => {
  if (raw === null) throw FormatError.absent("integer")

  const text = decodeText(raw)

  if (!INTEGER_TEXT.test(text)) throw FormatError.invalidInteger(text)

  const value = Number(text.trim())

  if (!Number.isSafeInteger(value)) throw FormatError.unsafeInteger(text.trim())

  return value
}
