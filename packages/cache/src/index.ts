export { type CreateCacheDeps, createCache, createStoreHandle } from "./composition/create-cache"
export {
  type LoadCacheConfigOptions,
  loadCacheConfig,
  mapEnvToConfig,
} from "./config/load-cache-config"
export {
  type CacheConfig,
  type CacheEnvConfig,
  cacheEnvSchema,
  type StoreDriver,
  storeDrivers,
} from "./config/schema"
export { Cache, type CacheDeps, STORE_OPERATION } from "./core/cache"
export { formatCallArgs, formatScalar } from "./core/codec/format-call-args"
export { encodeScalar, formatNumber } from "./core/codec/scalar-codec"
export { base10Integer, utf8Text } from "./core/converters"
export { FormatError, type FormatErrorCode } from "./core/errors/format-error"
export { readCallHistory } from "./core/history/read-call-history"
export { type ReplayDeps, type ReplayOutput, replay } from "./core/history/replay"
export { type CallKeys, callKeys } from "./core/instrumentation/call-keys"
export { countCalls } from "./core/instrumentation/count-calls"
export {
  defaultStages,
  type InstrumentOptions,
  instrument,
  isInstrumentedOperation,
} from "./core/instrumentation/instrument"
export { recordCallHistory } from "./core/instrumentation/record-call-history"
export type { CallHistory, CallRecord } from "./ports/call-history"
export type { Converter } from "./ports/converter"
export type {
  InstrumentedOperation,
  Operation,
  OperationStage,
  StageContext,
} from "./ports/instrumented-operation"
export type { Scalar } from "./ports/scalar"
