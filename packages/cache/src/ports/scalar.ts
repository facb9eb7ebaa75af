/**
 * A value the cache accepts: text, binary, or a number (integer or real).
 */
export type Scalar = string | Uint8Array | number
