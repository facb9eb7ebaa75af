import type { Connected } from "./connected"
import type { StoreKey } from "./store-key"
import type { StoreResult } from "./store-result"

/**
 * StoreHandle owns one logical connection to the external key-value store and
 * exposes the primitive commands the cache is built from.
 *
 * @remarks
 * - Values are opaque bytes; the handle never interprets them.
 * - Each command is atomic on its own. Nothing here makes a sequence of
 *   commands atomic.
 * - Failures surface as `ConnectionError` (store unreachable) or
 *   `StoreError` (command rejected). There are no retries.
 */
export interface StoreHandle extends Connected {
  /**
   * Open the connection. A no-op when already open.
   */
  connect(): Promise<void>

  /**
   * Close the connection. A no-op when already closed.
   */
  close(): Promise<void>

  /**
   * SET: store bytes under a key, replacing any value of any type.
   */
  set(key: StoreKey, value: Uint8Array): Promise<void>

  /**
   * GET: fetch the bytes stored under a key.
   */
  get(key: StoreKey): Promise<StoreResult>

  /**
   * INCR: add one to the integer stored under a key. An absent key counts as
   * zero.
   *
   * @returns The value after the increment.
   */
  incr(key: StoreKey): Promise<number>

  /**
   * EXISTS: whether a key holds any value.
   */
  exists(key: StoreKey): Promise<boolean>

  /**
   * RPUSH: append to the list stored under a key, creating it when absent.
   *
   * @returns The list length after the append.
   */
  rPush(key: StoreKey, value: Uint8Array): Promise<number>

  /**
   * LRANGE: read list elements between two inclusive indices. Negative
   * indices count from the end (`-1` is the last element). An absent key
   * reads as an empty list.
   */
  lRange(key: StoreKey, start: number, stop: number): Promise<Uint8Array[]>

  /**
   * FLUSHDB SYNC: delete every key in the selected database before resolving.
   */
  flush(): Promise<void>
}
