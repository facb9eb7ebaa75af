import type { Logger } from "@recall/logger"
import { createClient, RESP_TYPES } from "redis"

/**
 * The slice of the node-redis client the store handle talks to, with bulk
 * strings mapped to `Buffer` so binary values survive untouched.
 */
export type RedisBytesClient = {
  readonly isOpen: boolean
  readonly isReady: boolean

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  on(event: "error", listener: (err: Error) => void): unknown

  get(key: string): Promise<Buffer | null>
  set(key: string, value: Buffer): Promise<string | null>
  incr(key: string): Promise<number>
  exists(keys: string | readonly string[]): Promise<number>
  rPush(key: string, element: Buffer): Promise<number>
  lRange(key: string, start: number, stop: number): Promise<Buffer[]>
  flushDb(mode?: "ASYNC" | "SYNC"): Promise<string>
}

export type RedisBytesClientOptions = {
  url: string

  /**
   * How long `connect()` may take before it fails.
   *
   * @default 5000
   */
  connectTimeoutMs?: number

  logger: Logger
}

/**
 * Creates a client that never reconnects and never queues commands while
 * offline: an unreachable store fails the call in progress.
 *
 * @remarks
 * Caller owns `connect()` / `quit()` (usually through `RedisStoreHandle`).
 */
export function createRedisClient(options: RedisBytesClientOptions): RedisBytesClient {
  const logger = options.logger.child({ module: "redis-client" })

  const client = createClient({
    url: options.url,
    disableOfflineQueue: true,
    socket: {
      connectTimeout: options.connectTimeoutMs ?? 5000,
      reconnectStrategy: false,
    },
  }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  })

  client.on("error", (err: unknown) => {
    logger.error("Redis client error", { err })
  })

  return client as unknown as RedisBytesClient
}
