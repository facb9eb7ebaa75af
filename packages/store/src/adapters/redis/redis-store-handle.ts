import type { Logger } from "@recall/logger"
import type { StoreHandle } from "../../ports/store-handle"
import type { StoreKey } from "../../ports/store-key"
import type { StoreResult } from "../../ports/store-result"
import type { RedisBytesClient } from "./redis-client"
import { translateRedisError } from "./translate-redis-error"

export type RedisStoreHandleDeps = {
  client: RedisBytesClient
  logger: Logger
}

export type RedisStoreHandleOptions = {
  /**
   * Prepended verbatim to every key. Empty by default, so call-tracking keys
   * are the bare operation names.
   *
   * @remarks
   * `flush()` still clears the whole database, prefixed or not.
   */
  keyspacePrefix: string
}

export class RedisStoreHandle implements StoreHandle {
  private readonly logger: Logger

  public constructor(
    private readonly deps: RedisStoreHandleDeps,
    private readonly opts: RedisStoreHandleOptions = { keyspacePrefix: "" },
  ) {
    this.logger = deps.logger.child({ module: "redis-store" })
  }

  get isConnected(): boolean {
    return this.deps.client.isReady
  }

  async connect(): Promise<void> {
    if (this.deps.client.isOpen) return

    await this.run("CONNECT", undefined, () => this.deps.client.connect())
    this.logger.info("Connected to Redis")
  }

  async close(): Promise<void> {
    if (!this.deps.client.isOpen) return

    await this.run("QUIT", undefined, () => this.deps.client.quit())
    this.logger.info("Disconnected from Redis")
  }

  async set(key: StoreKey, value: Uint8Array): Promise<void> {
    await this.run("SET", key, () =>
      this.deps.client.set(this.fullKey(key), this.toBuffer(value)),
    )
  }

  async get(key: StoreKey): Promise<StoreResult> {
    const buffer = await this.run("GET", key, () => this.deps.client.get(this.fullKey(key)))

    if (buffer === null) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(buffer) }
  }

  async incr(key: StoreKey): Promise<number> {
    return await this.run("INCR", key, () => this.deps.client.incr(this.fullKey(key)))
  }

  async exists(key: StoreKey): Promise<boolean> {
    const count = await this.run("EXISTS", key, () =>
      this.deps.client.exists(this.fullKey(key)),
    )

    return count >= 1
  }

  async rPush(key: StoreKey, value: Uint8Array): Promise<number> {
    return await this.run("RPUSH", key, () =>
      this.deps.client.rPush(this.fullKey(key), this.toBuffer(value)),
    )
  }

  async lRange(key: StoreKey, start: number, stop: number): Promise<Uint8Array[]> {
    const buffers = await this.run("LRANGE", key, () =>
      this.deps.client.lRange(this.fullKey(key), start, stop),
    )

    return buffers.map((b) => new Uint8Array(b))
  }

  async flush(): Promise<void> {
    await this.run("FLUSHDB", undefined, () => this.deps.client.flushDb("SYNC"))
    this.logger.debug("Flushed Redis database")
  }

  private async run<T>(
    command: string,
    key: StoreKey | undefined,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw translateRedisError(err, { command, ...(key !== undefined && { key }) })
    }
  }

  private toBuffer(value: Uint8Array): Buffer {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
  }

  private fullKey(k: StoreKey): string {
    return `${this.opts.keyspacePrefix}${k}`
  }
}
