export {
  MemoryStoreHandle,
  type MemoryStoreHandleDeps,
  type MemoryStoreHandleOptions,
} from "./adapters/memory/memory-store-handle"
export {
  createRedisClient,
  type RedisBytesClient,
  type RedisBytesClientOptions,
} from "./adapters/redis/redis-client"
export {
  RedisStoreHandle,
  type RedisStoreHandleDeps,
  type RedisStoreHandleOptions,
} from "./adapters/redis/redis-store-handle"
export {
  ConnectionError,
  type ConnectionErrorCode,
  StoreError,
  type StoreErrorCode,
} from "./core/store-errors"
export { type Connected, isConnected } from "./ports/connected"
export type { StoreHandle } from "./ports/store-handle"
export type { StoreKey } from "./ports/store-key"
export type { StoreResult } from "./ports/store-result"
