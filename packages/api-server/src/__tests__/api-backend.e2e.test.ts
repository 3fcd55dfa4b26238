import {
  createBackend,
  identifierFor,
  NO_PASSWORD,
  normalizeApiDetails,
  type StorageBackend,
} from "@layerconf/drivers"
import { describeStorageBackendContract } from "@layerconf/drivers/testing"
import { NotFoundError } from "@layerconf/errors"
import { createConfigApi } from "../create-config-api"

async function createApiBackend(token: string | null): Promise<StorageBackend> {
  const server = createBackend({ type: "memory" })
  await server.initialize()
  const app = createConfigApi({ backend: server, token })

  return createBackend(
    { type: "api", host: "http://conf.test", password: token, encoder: "bytes" },
    { fetch: async (input, init) => app.request(input, init) },
  )
}

describeStorageBackendContract("ApiDriver over the config API", () => createApiBackend("test-secret"), {
  typeMismatchCode: "backend_error",
})

describe("ApiDriver end to end", () => {
  it("sets, reads and clears (music, 1, GLOBAL)", async () => {
    const details = normalizeApiDetails({ host: "http://conf.test/", password: NO_PASSWORD })
    const backend = await createApiBackend(details.password)
    await backend.initialize()
    const driver = backend.getDriver("music", "1")
    const id = identifierFor({ cogName: "music", uuid: "1", category: "GLOBAL" })

    await driver.set(id, true)
    expect(await driver.get(id)).toBe(true)

    await driver.clear(id)
    await expect(driver.get(id)).rejects.toBeInstanceOf(NotFoundError)

    await backend.teardown()
  })

  it("rejects a client with the wrong token", async () => {
    const server = createBackend({ type: "memory" })
    await server.initialize()
    const app = createConfigApi({ backend: server, token: "test-secret" })
    const client = createBackend(
      { type: "api", host: "http://conf.test", password: "wrong", encoder: "text" },
      { fetch: async (input, init) => app.request(input, init) },
    )
    await client.initialize()

    const id = identifierFor({ cogName: "music", uuid: "1", category: "GLOBAL" })

    await expect(client.getDriver("music", "1").set(id, 1)).rejects.toMatchObject({
      code: "backend_error",
      status: 401,
    })
  })
})
