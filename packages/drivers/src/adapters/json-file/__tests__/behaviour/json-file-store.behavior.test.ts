import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { BackendError } from "@layerconf/errors"
import { JsonFileStore } from "../../json-file-store"

describe("JsonFileStore (behavior)", () => {
  let rootDir: string
  let store: JsonFileStore

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), "layerconf-json-"))
    store = new JsonFileStore({ rootDir })
    await store.open()
  })

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true })
  })

  it("keeps one settings file per cog keyed by uuid", async () => {
    await store.mutate({ cogName: "music", uuid: "1" }, (doc) => {
      doc.GLOBAL = { on: true }
    })
    await store.mutate({ cogName: "music", uuid: "2" }, (doc) => {
      doc.GLOBAL = { on: false }
    })

    const raw = await fs.readFile(path.join(rootDir, "music", "settings.json"), "utf-8")

    expect(JSON.parse(raw)).toStrictEqual({
      "1": { GLOBAL: { on: true } },
      "2": { GLOBAL: { on: false } },
    })
    expect(await fs.readdir(path.join(rootDir, "music"))).toStrictEqual(["settings.json"])
  })

  it("serializes writers of different uuids in the same file", async () => {
    await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        store.mutate({ cogName: "music", uuid: String(i) }, (doc) => {
          doc.GLOBAL = i
        }),
      ),
    )

    const namespaces: string[] = []
    for await (const ns of store.namespaces()) namespaces.push(ns.uuid)

    expect(namespaces.sort()).toStrictEqual(["0", "1", "2", "3", "4", "5", "6", "7", "8", "9"])
  })

  it("lets two stores on one directory write the same cog at once", async () => {
    const other = new JsonFileStore({ rootDir })
    await other.open()

    await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        (i % 2 === 0 ? store : other).mutate({ cogName: "music", uuid: "1" }, (doc) => {
          doc.GLOBAL = i
        }),
      ),
    )

    expect(await fs.readdir(path.join(rootDir, "music"))).toStrictEqual(["settings.json"])
    const stored = await store.read({ cogName: "music", uuid: "1" })
    expect(Object.keys(stored ?? {})).toStrictEqual(["GLOBAL"])
  })

  it("removes the cog directory once it holds no data", async () => {
    await store.mutate({ cogName: "music", uuid: "1" }, (doc) => {
      doc.GLOBAL = 1
    })
    await store.mutate({ cogName: "music", uuid: "1" }, (doc) => {
      delete doc.GLOBAL
    })

    expect(await fs.readdir(rootDir)).toStrictEqual([])
  })

  it("rejects a corrupt settings file", async () => {
    await fs.mkdir(path.join(rootDir, "music"))
    await fs.writeFile(path.join(rootDir, "music", "settings.json"), "{oops")

    await expect(store.read({ cogName: "music", uuid: "1" })).rejects.toBeInstanceOf(BackendError)
  })

  it("keeps dot-only cog names inside the root directory", async () => {
    const nested = new JsonFileStore({ rootDir: path.join(rootDir, "data") })
    await nested.open()

    await nested.mutate({ cogName: "..", uuid: "1" }, (doc) => {
      doc.GLOBAL = { a: 1 }
    })
    await nested.mutate({ cogName: ".", uuid: "1" }, (doc) => {
      doc.GLOBAL = { b: 2 }
    })

    expect((await fs.readdir(rootDir)).sort()).toStrictEqual(["data"])
    expect((await fs.readdir(path.join(rootDir, "data"))).sort()).toStrictEqual(["%2E", "%2E%2E"])

    const namespaces: string[] = []
    for await (const ns of nested.namespaces()) namespaces.push(ns.cogName)
    expect(namespaces).toStrictEqual([".", ".."])
  })

  it("stores a __proto__ uuid as plain data", async () => {
    await store.mutate({ cogName: "music", uuid: "__proto__" }, (doc) => {
      doc.GLOBAL = { polluted: true }
    })

    expect(await store.read({ cogName: "music", uuid: "__proto__" })).toStrictEqual({
      GLOBAL: { polluted: true },
    })
    expect(Object.hasOwn(Object.prototype, "GLOBAL")).toBe(false)
    expect(await store.read({ cogName: "music", uuid: "constructor" })).toBeUndefined()
  })
})
