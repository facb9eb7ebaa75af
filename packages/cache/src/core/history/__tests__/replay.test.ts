import type { Logger } from "@recall/logger"
import { createNullLogger } from "@recall/logger"
import { StoreError, type StoreHandle } from "@recall/store"
import { mock } from "vitest-mock-extended"
import { collectOutput, createTestCache } from "../../../tests/utils/cache-test-helpers"
import { instrument } from "../../instrumentation/instrument"
import { replay } from "../replay"

describe("replay", () => {
  it("prints only the header for an operation called 0 times", async () => {
    const { cache } = createTestCache()
    await cache.initialize()
    const output = collectOutput()

    await replay(cache.store, { out: output.out })

    expect(output.text()).toBe("Cache.store was called 0 times:\n")
  })

  it("prints one line per recorded call", async () => {
    const { cache } = createTestCache()
    await cache.initialize()
    await cache.store("foo")
    await cache.store(123)
    await cache.store(new Uint8Array([0, 97, 98]))
    const output = collectOutput()

    await replay(cache.store, { out: output.out })

    expect(output.text()).toBe(
      [
        "Cache.store was called 3 times:",
        "Cache.store(*('foo',)) -> b'id-1'",
        "Cache.store(*(123,)) -> b'id-2'",
        String.raw`Cache.store(*(b'\x00ab',)) -> b'id-3'`,
        "",
      ].join("\n"),
    )
  })

  it("writes to stdout by default", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true)
    const { cache } = createTestCache()
    await cache.initialize()

    await replay(cache.store)

    expect(write).toHaveBeenCalledWith("Cache.store was called 0 times:\n")
  })

  it.each([
    ["a plain function", async () => "x"],
    ["a string", "Cache.store"],
    ["undefined", undefined],
    ["an object", { qualifiedName: "Cache.store" }],
  ])("does nothing for %s", async (_label, target) => {
    const output = collectOutput()

    await replay(target, { out: output.out })

    expect(output.text()).toBe("")
  })

  it("does nothing when the handle is not connected", async () => {
    const { cache } = createTestCache()
    await cache.initialize()
    await cache.store("foo")
    await cache.close()
    const output = collectOutput()

    await replay(cache.store, { out: output.out })

    expect(output.text()).toBe("")
  })

  it("propagates store failures while reading", async () => {
    const handle = mock<StoreHandle>({ isConnected: true })
    handle.get.mockResolvedValue({ kind: "not_found" })
    handle.lRange.mockRejectedValue(
      StoreError.wrongType("LRANGE", "Op.run:inputs"),
    )
    const logger: Logger = createNullLogger()
    const op = instrument(async () => "ok", { qualifiedName: "Op.run", handle, logger })

    await expect(replay(op, { out: collectOutput().out })).rejects.toBeInstanceOf(StoreError)
  })
})
