import { BackendError } from "@layerconf/errors"
import { FakeRedisClient } from "../../../../tests/fake-redis-client"
import { RedisStore } from "../../redis-store"

describe("RedisStore (behavior)", () => {
  let client: FakeRedisClient
  let store: RedisStore

  beforeEach(async () => {
    client = new FakeRedisClient()
    store = new RedisStore({ client }, { keyspacePrefix: "lc:" })
    await store.open()
  })

  it("connects on open and quits on close", async () => {
    expect(client.isOpen).toBe(true)

    await store.close()

    expect(client.isOpen).toBe(false)
  })

  it("stores one JSON string per namespace and indexes it", async () => {
    await store.mutate({ cogName: "music", uuid: "1" }, (doc) => {
      doc.GLOBAL = { on: true }
    })

    expect(client.strings.get("lc:music:1")).toBe('{"GLOBAL":{"on":true}}')
    expect([...(client.sets.get("lc:__namespaces__") ?? [])]).toStrictEqual(['["music","1"]'])
  })

  it("removes the key and index entry when the document empties", async () => {
    await store.mutate({ cogName: "music", uuid: "1" }, (doc) => {
      doc.GLOBAL = 1
    })
    await store.mutate({ cogName: "music", uuid: "1" }, (doc) => {
      delete doc.GLOBAL
    })

    expect(client.strings.has("lc:music:1")).toBe(false)
    expect(client.sets.has("lc:__namespaces__")).toBe(false)
  })

  it("writes nothing when the mutation throws", async () => {
    await expect(
      store.mutate({ cogName: "music", uuid: "1" }, () => {
        throw new Error("boom")
      }),
    ).rejects.toThrow("boom")

    expect(client.strings.size).toBe(0)
  })

  it("only deletes keys under its own prefix", async () => {
    client.strings.set("other:music:1", "{}")
    await store.mutate({ cogName: "music", uuid: "1" }, (doc) => {
      doc.GLOBAL = 1
    })

    await store.deleteAll()

    expect([...client.strings.keys()]).toStrictEqual(["other:music:1"])
  })

  it("rejects a corrupt document", async () => {
    client.strings.set("lc:music:1", "{not json")

    await expect(store.read({ cogName: "music", uuid: "1" })).rejects.toBeInstanceOf(BackendError)
  })

  it("gives dotted namespaces distinct keys", async () => {
    await store.mutate({ cogName: "a.b", uuid: "c" }, (doc) => {
      doc.x = 1
    })

    expect(await store.read({ cogName: "a", uuid: "b.c" })).toBeUndefined()
    expect(client.strings.get("lc:a.b:c")).toBe('{"x":1}')
  })

  it("escapes the separator inside either part", async () => {
    await store.mutate({ cogName: "a:b", uuid: "c" }, (doc) => {
      doc.x = 1
    })

    expect(await store.read({ cogName: "a", uuid: "b:c" })).toBeUndefined()
    expect(client.strings.get("lc:a%3Ab:c")).toBe('{"x":1}')
  })
})
