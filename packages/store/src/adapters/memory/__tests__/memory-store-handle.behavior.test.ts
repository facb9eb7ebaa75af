import { createNullLogger } from "@recall/logger"
import { ConnectionError, StoreError } from "../../../core/store-errors"
import { bytes, keys } from "../../../tests/utils/store-test-helpers"
import { MemoryStoreHandle } from "../memory-store-handle"

describe("MemoryStoreHandle (behavior)", () => {
  const logger = createNullLogger()

  describe("before connect()", () => {
    it("is not connected", () => {
      expect(new MemoryStoreHandle({ logger }).isConnected).toBe(false)
    })

    it("rejects commands with a retryable ConnectionError naming the command", async () => {
      const handle = new MemoryStoreHandle({ logger })

      const err = await handle.incr(keys.counter()).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ConnectionError)
      expect(err).toMatchObject({
        code: "connection_error",
        isRetryable: true,
        context: { command: "INCR" },
      })
    })
  })

  describe("maxEntries", () => {
    it("fails writes that would create a key past the limit", async () => {
      const handle = new MemoryStoreHandle({ logger }, { maxEntries: 2 })
      await handle.connect()

      await handle.set("a", bytes.a())
      await handle.rPush("b", bytes.b())

      await expect(handle.set("c", bytes.c())).rejects.toThrow("max entries (2) exceeded")
      await expect(handle.incr("c")).rejects.toBeInstanceOf(StoreError)
      await expect(handle.rPush("c", bytes.c())).rejects.toBeInstanceOf(StoreError)
    })

    it("allows updates of existing keys at the limit", async () => {
      const handle = new MemoryStoreHandle({ logger }, { maxEntries: 1 })
      await handle.connect()

      await handle.set("a", bytes.a())
      await handle.set("a", bytes.b())

      expect(await handle.get("a")).toStrictEqual({ kind: "found", value: bytes.b() })
    })

    it("frees capacity on flush", async () => {
      const handle = new MemoryStoreHandle({ logger }, { maxEntries: 1 })
      await handle.connect()

      await handle.set("a", bytes.a())
      await handle.flush()
      await handle.set("b", bytes.b())

      expect(await handle.exists("b")).toBe(true)
    })
  })

  describe("incr parsing", () => {
    it.each(["+1", " 1", "01", "1.5", ""])("rejects %j", async (text) => {
      const handle = new MemoryStoreHandle({ logger })
      await handle.connect()
      await handle.set(keys.counter(), bytes.text(text))

      await expect(handle.incr(keys.counter())).rejects.toThrow(
        "value is not an integer or out of range",
      )
    })

    it("accepts negative values", async () => {
      const handle = new MemoryStoreHandle({ logger })
      await handle.connect()
      await handle.set(keys.counter(), bytes.text("-5"))

      expect(await handle.incr(keys.counter())).toBe(-4)
    })
  })

  describe("isolation", () => {
    it("returns copies that callers cannot use to change stored data", async () => {
      const handle = new MemoryStoreHandle({ logger })
      await handle.connect()
      await handle.rPush(keys.list(), bytes.a())

      const [first] = await handle.lRange(keys.list(), 0, -1)
      first?.fill(0)

      expect(await handle.lRange(keys.list(), 0, -1)).toStrictEqual([bytes.a()])
    })

    it("keeps data across close() and connect()", async () => {
      const handle = new MemoryStoreHandle({ logger })
      await handle.connect()
      await handle.set(keys.one(), bytes.a())

      await handle.close()
      await handle.connect()

      expect(await handle.exists(keys.one())).toBe(true)
    })
  })
})
