/**
 * Represents a key in the store.
 *
 * @remarks
 * Call-tracking keys are derived from qualified operation names,
 * e.g. "Cache.store", "Cache.store:inputs".
 */
export type StoreKey = string
