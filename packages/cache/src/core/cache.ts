import { type IdGenerator, uuidV4 } from "@recall/id"
import type { Logger } from "@recall/logger"
import type { StoreHandle, StoreKey } from "@recall/store"
import type { Converter } from "../ports/converter"
import type { InstrumentedOperation } from "../ports/instrumented-operation"
import type { Scalar } from "../ports/scalar"
import { encodeScalar } from "./codec/scalar-codec"
import { base10Integer, utf8Text } from "./converters"
import { instrument } from "./instrumentation/instrument"

export const STORE_OPERATION = "Cache.store"

export type CacheDeps = {
  handle: StoreHandle
  logger: Logger

  /** @default uuidV4 */
  ids?: IdGenerator<string>
}

/**
 * Stores scalars under fresh identifiers and reads them back.
 *
 * Every `store` call is counted and its input and output are appended to
 * the history lists, which `replay(cache.store)` prints.
 *
 * @example
 * ```ts
 * const cache = new Cache({ handle, logger })
 * await cache.initialize()
 *
 * const id = await cache.store("foo")
 * await cache.getStr(id) // "foo"
 * ```
 */
export class Cache {
  readonly store: InstrumentedOperation<[value: Scalar], string>

  private readonly logger: Logger
  private readonly ids: IdGenerator<string>

  public constructor(private readonly deps: CacheDeps) {
    this.logger = deps.logger.child({ module: "cache" })
    this.ids = deps.ids ?? uuidV4

    this.store = instrument((value: Scalar) => this.write(value), {
      qualifiedName: STORE_OPERATION,
      handle: deps.handle,
      logger: this.logger,
    })
  }

  /**
   * Connects to the store and deletes everything in it.
   */
  async initialize(): Promise<void> {
    await this.deps.handle.connect()
    await this.deps.handle.flush()

    this.logger.info("Cache initialized")
  }

  async close(): Promise<void> {
    await this.deps.handle.close()
  }

  get(key: StoreKey): Promise<Uint8Array | null>
  get<T>(key: StoreKey, convert: Converter<T>): Promise<T>
  async get<T>(key: StoreKey, convert?: Converter<T>): Promise<T | Uint8Array | null> {
    const res = await this.deps.handle.get(key)
    const raw = res.kind === "found" ? res.value : null

    return convert ? convert(raw) : raw
  }

  async getStr(key: StoreKey): Promise<string> {
    return await this.get(key, utf8Text)
  }

  async getInt(key: StoreKey): Promise<number> {
    return await this.get(key, base10Integer)
  }

  private async write(value: Scalar): Promise<string> {
    const key = this.ids.generate()

    await this.deps.handle.set(key, encodeScalar(value))
    this.logger.debug("Stored value", { key, operation: STORE_OPERATION })

    return key
  }
}
