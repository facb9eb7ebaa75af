/**
 * Turns the raw bytes read from the store into a typed value.
 *
 * Receives `null` when the key is absent; a converter either maps that to a
 * value of its own or fails.
 */
export type Converter<T> = (raw: Uint8Array | null) => T
