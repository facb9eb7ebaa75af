import { type LogLevelName, logLevelNames } from "@recall/logger"
import { z } from "zod"

export const storeDrivers = ["redis", "memory"] as const

export type StoreDriver = (typeof storeDrivers)[number]

export const cacheEnvSchema = z.object({
  SERVICE_NAME: z.string().default("recall"),

  STORE_DRIVER: z.enum(storeDrivers).default("redis"),

  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_KEY_PREFIX: z.string().default(""),
  REDIS_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  MEMORY_MAX_ENTRIES: z.coerce.number().int().positive().optional(),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.enum(["true", "false"]).default("false"),
})

export type CacheEnvConfig = z.infer<typeof cacheEnvSchema>

export type CacheConfig = {
  store: {
    driver: StoreDriver
  }

  redis: {
    url: string
    keyPrefix: string
    connectTimeoutMs: number
  }

  memory: {
    maxEntries?: number
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}
