import type { Scalar } from "../../ports/scalar"

const encoder = new TextEncoder()

const EXPONENT_AT_OR_ABOVE = 1e16
const EXPONENT_BELOW = 1e-4

function formatExponent(value: number): string {
  const [mantissa = "", exponent = "0"] = value.toExponential().split("e")
  const sign = exponent.startsWith("-") ? "-" : "+"
  const digits = exponent.replace(/^[+-]/, "").padStart(2, "0")

  return `${mantissa}e${sign}${digits}`
}

/**
 * Decimal text form of a number as written to the store.
 *
 * - Non-finite values use the spellings `inf`, `-inf` and `nan`.
 * - Magnitudes from `1e16` up and below `1e-4` use a signed exponent of at
 *   least two digits: `1e+16`, `1e-07`.
 * - Negative zero keeps its sign as `-0.0`.
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return "nan"
  if (value === Number.POSITIVE_INFINITY) return "inf"
  if (value === Number.NEGATIVE_INFINITY) return "-inf"
  if (Object.is(value, -0)) return "-0.0"

  const magnitude = Math.abs(value)

  if (magnitude !== 0 && (magnitude >= EXPONENT_AT_OR_ABOVE || magnitude < EXPONENT_BELOW)) {
    return formatExponent(value)
  }

  return String(value)
}

/**
 * Wire form of a scalar: text as UTF-8, binary as-is, numbers as decimal text.
 */
export function encodeScalar(value: Scalar): Uint8Array {
  if (typeof value === "string") return encoder.encode(value)
  if (typeof value === "number") return encoder.encode(formatNumber(value))

  return value
}
