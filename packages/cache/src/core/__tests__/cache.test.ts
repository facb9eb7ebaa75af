import { createNullLogger } from "@recall/logger"
import { ConnectionError } from "@recall/store"
import {
  createTestCache,
  readList,
  readText,
  text,
} from "../../tests/utils/cache-test-helpers"
import { Cache } from "../cache"
import { FormatError } from "../errors/format-error"

describe("Cache", () => {
  describe("store", () => {
    it("records calls, inputs and outputs in call order", async () => {
      const { cache, handle } = createTestCache()
      await cache.initialize()

      const first = await cache.store("foo")
      const second = await cache.store(123)

      expect(first).toBe("id-1")
      expect(second).toBe("id-2")
      expect(await cache.getStr(first)).toBe("foo")
      expect(await cache.getInt(second)).toBe(123)
      expect(await readText(handle, "Cache.store")).toBe("2")
      expect(await readList(handle, "Cache.store:inputs")).toStrictEqual([
        "('foo',)",
        "(123,)",
      ])
      expect(await readList(handle, "Cache.store:outputs")).toStrictEqual(["id-1", "id-2"])
    })

    it("keeps N calls aligned across counter and history", async () => {
      const { cache, handle } = createTestCache()
      await cache.initialize()

      for (const value of ["a", "b", "c", "d", "e"]) {
        await cache.store(value)
      }

      expect(await readText(handle, "Cache.store")).toBe("5")
      expect(await readList(handle, "Cache.store:inputs")).toStrictEqual([
        "('a',)",
        "('b',)",
        "('c',)",
        "('d',)",
        "('e',)",
      ])
      expect(await readList(handle, "Cache.store:outputs")).toStrictEqual([
        "id-1",
        "id-2",
        "id-3",
        "id-4",
        "id-5",
      ])
    })

    it("counts every one of many parallel calls", async () => {
      const { cache, handle } = createTestCache()
      await cache.initialize()

      const ids = await Promise.all(Array.from({ length: 50 }, (_, i) => cache.store(i)))

      expect(new Set(ids).size).toBe(50)
      expect(await readText(handle, "Cache.store")).toBe("50")
      expect(await readList(handle, "Cache.store:inputs")).toHaveLength(50)
      expect(await readList(handle, "Cache.store:outputs")).toHaveLength(50)
    })

    it("generates UUID v4 identifiers by default", async () => {
      const { handle } = createTestCache()
      const cache = new Cache({ handle, logger: createNullLogger() })
      await cache.initialize()

      const id = await cache.store("foo")

      expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
    })

    it("fails with ConnectionError before initialize()", async () => {
      const { cache } = createTestCache()

      await expect(cache.store("foo")).rejects.toBeInstanceOf(ConnectionError)
    })

    it("exposes its qualified name and handle", () => {
      const { cache, handle } = createTestCache()

      expect(cache.store.qualifiedName).toBe("Cache.store")
      expect(cache.store.handle).toBe(handle)
    })
  })

  describe("round trips", () => {
    it("returns binary values byte for byte", async () => {
      const { cache } = createTestCache()
      await cache.initialize()
      const value = new Uint8Array([0, 255, 10, 13])

      const id = await cache.store(value)

      expect(await cache.get(id)).toStrictEqual(value)
    })

    it("returns text unchanged", async () => {
      const { cache } = createTestCache()
      await cache.initialize()

      expect(await cache.getStr(await cache.store("héllo ✓"))).toBe("héllo ✓")
      expect(await cache.getStr(await cache.store(""))).toBe("")
    })

    it("returns numbers as their decimal text", async () => {
      const { cache } = createTestCache()
      await cache.initialize()

      expect(await cache.getStr(await cache.store(123))).toBe("123")
      expect(await cache.getStr(await cache.store(1.5))).toBe("1.5")
      expect(await cache.getInt(await cache.store(-9))).toBe(-9)
    })
  })

  describe("get", () => {
    it("returns null for a missing key", async () => {
      const { cache } = createTestCache()
      await cache.initialize()

      expect(await cache.get("missing")).toBeNull()
    })

    it("applies a custom converter", async () => {
      const { cache } = createTestCache()
      await cache.initialize()
      const id = await cache.store("abc")

      const length = await cache.get(id, (raw) => (raw === null ? -1 : raw.length))

      expect(length).toBe(3)
      expect(await cache.get("missing", (raw) => (raw === null ? -1 : raw.length))).toBe(-1)
    })

    it("fails getInt on non-numeric bytes", async () => {
      const { cache } = createTestCache()
      await cache.initialize()
      const id = await cache.store("abc")

      await expect(cache.getInt(id)).rejects.toBeInstanceOf(FormatError)
    })

    it("fails the typed readers on a missing key", async () => {
      const { cache } = createTestCache()
      await cache.initialize()

      await expect(cache.getStr("missing")).rejects.toBeInstanceOf(FormatError)
      await expect(cache.getInt("missing")).rejects.toBeInstanceOf(FormatError)
    })
  })

  describe("initialize", () => {
    it("clears data written before it", async () => {
      const { cache, handle } = createTestCache()
      await handle.connect()
      await handle.set("stale", text("old"))
      await handle.incr("Cache.store")

      await cache.initialize()

      expect(await handle.exists("stale")).toBe(false)
      expect(await handle.exists("Cache.store")).toBe(false)
    })
  })

  describe("close", () => {
    it("closes the handle", async () => {
      const { cache, handle } = createTestCache()
      await cache.initialize()

      await cache.close()

      expect(handle.isConnected).toBe(false)
    })
  })

  it("shares call records between instances on the same store", async () => {
    const { cache, handle } = createTestCache()
    const other = new Cache({ handle, logger: createNullLogger() })
    await cache.initialize()

    await cache.store("a")
    await other.store("b")

    expect(await readText(handle, "Cache.store")).toBe("2")
  })
})
