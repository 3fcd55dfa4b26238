import type { StorageBackend } from "@layerconf/drivers"
import type { Context } from "hono"
import { parseOrThrow, ValidationError } from "../errors/validation"
import type { ApiEnv, ConfigApi } from "../types"
import {
  identifierBody,
  identifierFromPath,
  incrementBody,
  setBody,
  toggleBody,
} from "./request-schemas"

async function readJson(c: Context<ApiEnv>): Promise<unknown> {
  try {
    return await c.req.json()
  } catch {
    throw new ValidationError("Request body must be JSON")
  }
}

/**
 * The remote config wire protocol. Every write answers `{ value }`; reads
 * answer the stored value itself.
 */
export function registerConfigRoutes(app: ConfigApi, backend: StorageBackend): void {
  const driverFor = (path: readonly string[]) => {
    const id = identifierFromPath(path)
    return { id, driver: backend.getDriver(id.cogName, id.uuid) }
  }

  app.post("/config/get", async (c) => {
    const body = parseOrThrow(identifierBody, await readJson(c))
    const { id, driver } = driverFor(body.identifier)

    return c.json(await driver.get(id))
  })

  app.put("/config/set", async (c) => {
    const body = parseOrThrow(setBody, await readJson(c))
    const { id, driver } = driverFor(body.identifier)

    return c.json({ value: await driver.set(id, body.config_data) })
  })

  app.put("/config/clear", async (c) => {
    const body = parseOrThrow(identifierBody, await readJson(c))
    const { id, driver } = driverFor(body.identifier)

    await driver.clear(id)

    return c.json({ value: null })
  })

  app.put("/config/increment", async (c) => {
    const body = parseOrThrow(incrementBody, await readJson(c))
    const { id, driver } = driverFor(body.identifier)

    return c.json({ value: await driver.increment(id, body.config_data, body.default ?? 0) })
  })

  app.put("/config/toggle", async (c) => {
    const body = parseOrThrow(toggleBody, await readJson(c))
    const { id, driver } = driverFor(body.identifier)

    return c.json({
      value: await driver.toggle(id, body.config_data ?? undefined, body.default ?? false),
    })
  })

  app.put("/config/clear_all", async (c) => {
    await backend.deleteAllData({ confirm: c.req.query("i_want_to_do_this") === "true" })

    return c.json({ value: null })
  })

  app.post("/config/cogs", async (c) => {
    const value: [string, string][] = []

    for await (const ns of backend.namespaces()) {
      value.push([ns.cogName, ns.uuid])
    }

    return c.json({ value })
  })
}
