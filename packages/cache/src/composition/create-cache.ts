import type { IdGenerator } from "@recall/id"
import { createPinoLogger, type Logger } from "@recall/logger"
import {
  createRedisClient,
  MemoryStoreHandle,
  type RedisBytesClient,
  RedisStoreHandle,
  type StoreHandle,
} from "@recall/store"
import type { CacheConfig } from "../config/schema"
import { Cache } from "../core/cache"

export type CreateCacheDeps = {
  logger?: Logger
  redisClient?: RedisBytesClient
  ids?: IdGenerator<string>
}

export function createStoreHandle(
  config: CacheConfig,
  logger: Logger,
  redisClient?: RedisBytesClient,
): StoreHandle {
  switch (config.store.driver) {
    case "memory":
      return new MemoryStoreHandle({ logger }, { ...config.memory })

    case "redis": {
      const client =
        redisClient ??
        createRedisClient({
          url: config.redis.url,
          connectTimeoutMs: config.redis.connectTimeoutMs,
          logger,
        })

      return new RedisStoreHandle(
        { client, logger },
        { keyspacePrefix: config.redis.keyPrefix },
      )
    }
  }
}

/**
 * Wires a `Cache` from configuration. The caller owns `initialize()` and
 * `close()`.
 */
export function createCache(config: CacheConfig, deps: CreateCacheDeps = {}): Cache {
  const logger =
    deps.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName },
    )

  const handle = createStoreHandle(config, logger, deps.redisClient)

  return new Cache({
    handle,
    logger,
    ...(deps.ids !== undefined && { ids: deps.ids }),
  })
}
