import type { Logger } from "@recall/logger"
import { ConnectionError, StoreError } from "../../core/store-errors"
import type { StoreHandle } from "../../ports/store-handle"
import type { StoreKey } from "../../ports/store-key"
import type { StoreResult } from "../../ports/store-result"

export type MemoryStoreHandleOptions = {
  /**
   * Maximum number of keys retained in the store.
   *
   * If set and a write would create a key beyond the limit, it fails with
   * `StoreError`.
   */
  maxEntries?: number
}

export type MemoryStoreHandleDeps = {
  logger: Logger
}

type MemoryEntry =
  | { readonly kind: "string"; value: Uint8Array }
  | { readonly kind: "list"; items: Uint8Array[] }

const INTEGER_TEXT = /^(0|-?[1-9]\d*)$/

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * In-process store with Redis semantics for strings and lists.
 *
 * @remarks
 * - Every command body runs synchronously, so each command is atomic with
 *   respect to other callers, as on a real Redis server.
 * - Commands fail with `ConnectionError` until `connect()` is called.
 */
export class MemoryStoreHandle implements StoreHandle {
  private readonly entries = new Map<StoreKey, MemoryEntry>()
  private readonly logger: Logger
  private connected = false

  public constructor(
    deps: MemoryStoreHandleDeps,
    private readonly opts: MemoryStoreHandleOptions = {},
  ) {
    this.logger = deps.logger.child({ module: "memory-store" })
  }

  get isConnected(): boolean {
    return this.connected
  }

  async connect(): Promise<void> {
    if (this.connected) return

    this.connected = true
    this.logger.info("Connected to in-memory store")
  }

  async close(): Promise<void> {
    if (!this.connected) return

    this.connected = false
    this.logger.info("Disconnected from in-memory store")
  }

  async set(key: StoreKey, value: Uint8Array): Promise<void> {
    this.ensureConnected("SET")
    this.enforceMaxEntries(key)

    this.entries.set(key, { kind: "string", value: new Uint8Array(value) })
  }

  async get(key: StoreKey): Promise<StoreResult> {
    this.ensureConnected("GET")

    const entry = this.entries.get(key)
    if (!entry) return { kind: "not_found" }
    if (entry.kind !== "string") throw StoreError.wrongType("GET", key)

    return { kind: "found", value: new Uint8Array(entry.value) }
  }

  async incr(key: StoreKey): Promise<number> {
    this.ensureConnected("INCR")

    const entry = this.entries.get(key)
    if (entry && entry.kind !== "string") throw StoreError.wrongType("INCR", key)

    const current = entry ? this.parseInteger(key, entry.value) : 0
    const next = current + 1

    if (!Number.isSafeInteger(next)) throw StoreError.notAnInteger(key)
    if (!entry) this.enforceMaxEntries(key)

    this.entries.set(key, { kind: "string", value: encoder.encode(String(next)) })

    return next
  }

  async exists(key: StoreKey): Promise<boolean> {
    this.ensureConnected("EXISTS")

    return this.entries.has(key)
  }

  async rPush(key: StoreKey, value: Uint8Array): Promise<number> {
    this.ensureConnected("RPUSH")

    const entry = this.entries.get(key)

    if (!entry) {
      this.enforceMaxEntries(key)
      this.entries.set(key, { kind: "list", items: [new Uint8Array(value)] })
      return 1
    }

    if (entry.kind !== "list") throw StoreError.wrongType("RPUSH", key)

    entry.items.push(new Uint8Array(value))

    return entry.items.length
  }

  async lRange(key: StoreKey, start: number, stop: number): Promise<Uint8Array[]> {
    this.ensureConnected("LRANGE")

    const entry = this.entries.get(key)
    if (!entry) return []
    if (entry.kind !== "list") throw StoreError.wrongType("LRANGE", key)

    const length = entry.items.length
    const from = Math.max(start < 0 ? length + start : start, 0)
    const to = Math.min(stop < 0 ? length + stop : stop, length - 1)

    if (from > to) return []

    return entry.items.slice(from, to + 1).map((item) => new Uint8Array(item))
  }

  async flush(): Promise<void> {
    this.ensureConnected("FLUSHDB")

    this.entries.clear()
    this.logger.debug("Flushed in-memory store")
  }

  private ensureConnected(command: string): void {
    if (!this.connected) throw ConnectionError.notConnected(command)
  }

  private enforceMaxEntries(key: StoreKey): void {
    if (this.opts.maxEntries === undefined) return
    if (this.entries.has(key)) return

    if (this.entries.size >= this.opts.maxEntries) {
      throw StoreError.capacityExceeded(this.opts.maxEntries)
    }
  }

  private parseInteger(key: StoreKey, value: Uint8Array): number {
    const text = decoder.decode(value)

    if (!INTEGER_TEXT.test(text)) throw StoreError.notAnInteger(key)

    return Number(text)
  }
}
