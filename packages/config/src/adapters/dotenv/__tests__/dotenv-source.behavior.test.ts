import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "recall-dotenv-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("parses key=value pairs, quotes and comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "# local overrides\nREDIS_URL=redis://localhost:6380\nSERVICE_NAME='recall dev'\n",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(await source.load()).toEqual({
      REDIS_URL: "redis://localhost:6380",
      SERVICE_NAME: "recall dev",
    })
  })

  it("names itself after the file", () => {
    expect(new DotenvSource({ file: ".env.test", required: false }).name).toBe(
      "dotenv:.env.test",
    )
  })

  it("returns an empty object when the optional file is missing", async () => {
    const source = new DotenvSource({ file: ".env", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("throws when the required file is missing", async () => {
    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.load()).rejects.toThrow("ENOENT")
  })
})
