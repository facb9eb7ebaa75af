import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  type IConfig,
  loadConfig,
  ObjectSource,
} from "@recall/config"
import type { Logger } from "@recall/logger"
import { type CacheConfig, type CacheEnvConfig, cacheEnvSchema } from "./schema"

export function mapEnvToConfig(env: CacheEnvConfig): CacheConfig {
  return {
    store: {
      driver: env.STORE_DRIVER,
    },
    redis: {
      url: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
      connectTimeoutMs: env.REDIS_CONNECT_TIMEOUT_MS,
    },
    memory: {
      ...(env.MEMORY_MAX_ENTRIES !== undefined && { maxEntries: env.MEMORY_MAX_ENTRIES }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY === "true",
      serviceName: env.SERVICE_NAME,
    },
  }
}

export type LoadCacheConfigOptions = {
  /**
   * Settings applied on top of the environment, e.g. from an embedding
   * application or a test.
   */
  overrides?: Record<string, string>

  /** Receives where each setting came from and any ignored override keys. */
  logger?: Logger
}

/**
 * Loads `.env` from `cwd` (if present), then `env`, then `overrides`, each
 * on top of the previous.
 */
export async function loadCacheConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
  options: LoadCacheConfigOptions = {},
): Promise<CacheConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd }),
    new EnvSource({ env }),
  ]

  if (options.overrides) sources.push(new ObjectSource(options.overrides))

  const result = await loadConfig({ schema: cacheEnvSchema, sources })

  if (options.logger) reportProvenance(result, options.overrides ?? {}, options.logger)

  return mapEnvToConfig(result.value)
}

function reportProvenance(
  config: IConfig<CacheEnvConfig>,
  overrides: Record<string, string>,
  logger: Logger,
): void {
  const log = logger.child({ module: "config" })

  log.debug("Configuration loaded", {
    sources: config.sourcesUsed(),
    driver: config.get("STORE_DRIVER"),
    driverSource: config.explain("STORE_DRIVER"),
    redisUrlSource: config.explain("REDIS_URL"),
  })

  const ignored = config.unknownKeys().filter((key) => Object.hasOwn(overrides, key))

  if (ignored.length > 0) {
    log.warn("Ignoring unknown configuration overrides", { keys: ignored })
  }
}
