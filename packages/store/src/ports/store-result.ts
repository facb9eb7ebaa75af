export type StoreFound = {
  readonly kind: "found"
  readonly value: Uint8Array
}

export type StoreNotFound = {
  readonly kind: "not_found"
}

/**
 * Result of a GET. A miss means the key does not exist (or was flushed).
 */
export type StoreResult = StoreFound | StoreNotFound
