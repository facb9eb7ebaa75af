import type { StoreKey } from "@recall/store"

export type CallKeys = {
  counter: StoreKey
  inputs: StoreKey
  outputs: StoreKey
}

/**
 * Store keys holding the call records of one operation.
 *
 * @example
 * callKeys("Cache.store")
 * // { counter: "Cache.store", inputs: "Cache.store:inputs", outputs: "Cache.store:outputs" }
 */
export function callKeys(qualifiedName: string): CallKeys {
  return {
    counter: qualifiedName,
    inputs: `${qualifiedName}:inputs`,
    outputs: `${qualifiedName}:outputs`,
  }
}
