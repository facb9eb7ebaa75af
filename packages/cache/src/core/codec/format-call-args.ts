import type { Scalar } from "../../ports/scalar"
import { formatNumber } from "./scalar-codec"

const SINGLE_QUOTE = 0x27
const DOUBLE_QUOTE = 0x22
const BACKSLASH = 0x5c

const NAMED_ESCAPES: ReadonlyMap<number, string> = new Map([
  [0x09, "\\t"],
  [0x0a, "\\n"],
  [0x0d, "\\r"],
])

function hexEscape(code: number): string {
  return `\\x${code.toString(16).padStart(2, "0")}`
}

function pickQuote(hasSingle: boolean, hasDouble: boolean): number {
  return hasSingle && !hasDouble ? DOUBLE_QUOTE : SINGLE_QUOTE
}

function escapeCode(code: number, quote: number): string | undefined {
  if (code === BACKSLASH) return "\\\\"
  if (code === quote) return `\\${String.fromCharCode(quote)}`

  return NAMED_ESCAPES.get(code)
}

function formatText(value: string): string {
  const quote = pickQuote(value.includes("'"), value.includes('"'))
  let body = ""

  for (const char of value) {
    const code = char.codePointAt(0) ?? 0
    const escaped = escapeCode(code, quote)

    if (escaped !== undefined) body += escaped
    else if (code < 0x20 || (code >= 0x7f && code <= 0xa0)) body += hexEscape(code)
    else body += char
  }

  const q = String.fromCharCode(quote)

  return `${q}${body}${q}`
}

function formatBytes(value: Uint8Array): string {
  const quote = pickQuote(value.includes(SINGLE_QUOTE), value.includes(DOUBLE_QUOTE))
  let body = ""

  for (const code of value) {
    const escaped = escapeCode(code, quote)

    if (escaped !== undefined) body += escaped
    else if (code < 0x20 || code >= 0x7f) body += hexEscape(code)
    else body += String.fromCharCode(code)
  }

  const q = String.fromCharCode(quote)

  return `b${q}${body}${q}`
}

export function formatScalar(value: Scalar): string {
  if (typeof value === "string") return formatText(value)
  if (typeof value === "number") return formatNumber(value)

  return formatBytes(value)
}

/**
 * Display form of a call's positional arguments, as recorded in the inputs
 * history: `()`, `('foo',)`, `(123,)`, `(b'\x00ab', 1.5)`.
 */
export function formatCallArgs(args: readonly Scalar[]): string {
  const parts = args.map(formatScalar)

  if (parts.length === 1) return `(${parts[0]},)`

  return `(${parts.join(", ")})`
}
