export type CallRecord = {
  /** Display form of the positional arguments, e.g. `('foo',)`. */
  input: string

  /** The output exactly as recorded. */
  output: Uint8Array
}

export type CallHistory = {
  operation: string
  count: number
  calls: CallRecord[]
}
