/**
 * Capability of anything backed by a live store connection.
 */
export interface Connected {
  /** `true` while commands can be sent to the store */
  readonly isConnected: boolean
}

/**
 * Capability check used instead of inspecting concrete handle types.
 * Narrows to `Connected` only when the connection is currently live.
 */
export function isConnected(value: unknown): value is Connected {
  return (
    typeof value === "object" &&
    value !== null &&
    "isConnected" in value &&
    value.isConnected === true
  )
}
