import { BackendError, NotFoundError } from "@layerconf/errors"
import type { Logger } from "@layerconf/logger"
import type { CustomGroupData } from "../../core/identifier/categories"
import type { IdentifierData } from "../../core/identifier/identifier-data"
import { importData } from "../../core/migration/import-data"
import type { ConfigDriver, ImportReport, ImportRow } from "../../ports/config-driver"
import { isJsonObject, isJsonValue, type JsonValue } from "../../ports/json-value"
import type { ApiRequest, ApiResponse, ApiSession } from "./api-session"

export const ApiEndpoint = {
  get: "/config/get",
  set: "/config/set",
  clear: "/config/clear",
  increment: "/config/increment",
  toggle: "/config/toggle",
  clearAll: "/config/clear_all",
  cogs: "/config/cogs",
} as const

export type ApiDriverDeps = {
  session: ApiSession
  logger: Logger
  assertReady: () => void
}

/**
 * Maps each driver operation to one HTTP request. Atomicity of increment and
 * toggle is the server's responsibility.
 */
export class ApiDriver implements ConfigDriver {
  constructor(
    private readonly deps: ApiDriverDeps,
    readonly cogName: string,
    readonly uuid: string,
  ) {}

  async get(id: IdentifierData): Promise<JsonValue> {
    const res = await this.call({ method: "POST", endpoint: ApiEndpoint.get, body: { identifier: id.toPath() } })

    if (res.status !== 200) {
      if (res.status !== 404) {
        this.deps.logger.warn("Read failed, reporting the value as missing", {
          cogName: this.cogName,
          uuid: this.uuid,
          identifier: id.toString(),
          status: res.status,
          body: res.text,
        })
      }
      throw new NotFoundError(id.toString(), {
        context: { status: res.status, body: res.text },
      })
    }

    const body = this.deps.session.decode(res, ApiEndpoint.get)
    if (!isJsonValue(body)) {
      throw new BackendError(`Malformed response from ${ApiEndpoint.get}`, {
        body: res.text,
        status: res.status,
        identifier: id.toString(),
      })
    }

    return body
  }

  async set(id: IdentifierData, value: JsonValue): Promise<JsonValue> {
    return this.valueOf(id, {
      method: "PUT",
      endpoint: ApiEndpoint.set,
      body: { identifier: id.toPath(), config_data: value },
    })
  }

  async clear(id: IdentifierData): Promise<void> {
    await this.valueOf(id, {
      method: "PUT",
      endpoint: ApiEndpoint.clear,
      body: { identifier: id.toPath() },
    })
  }

  async increment(id: IdentifierData, delta: number, defaultValue = 0): Promise<number> {
    const value = await this.valueOf(id, {
      method: "PUT",
      endpoint: ApiEndpoint.increment,
      body: { identifier: id.toPath(), config_data: delta, default: defaultValue },
    })

    if (typeof value !== "number") {
      throw new BackendError(`${ApiEndpoint.increment} returned a non-number value`, {
        identifier: id.toString(),
      })
    }

    return value
  }

  async toggle(id: IdentifierData, value?: boolean, defaultValue = false): Promise<boolean> {
    const result = await this.valueOf(id, {
      method: "PUT",
      endpoint: ApiEndpoint.toggle,
      body: { identifier: id.toPath(), config_data: value ?? null, default: defaultValue },
    })

    if (typeof result !== "boolean") {
      throw new BackendError(`${ApiEndpoint.toggle} returned a non-boolean value`, {
        identifier: id.toString(),
      })
    }

    return result
  }

  async importData(
    rows: Iterable<ImportRow>,
    customGroups: CustomGroupData = {},
  ): Promise<ImportReport> {
    this.deps.assertReady()

    return importData({ driver: this, logger: this.deps.logger }, rows, customGroups)
  }

  private async call(req: ApiRequest): Promise<ApiResponse> {
    this.deps.assertReady()

    return this.deps.session.send(req)
  }

  /** Sends `req` and returns the `value` key of a 200 response. */
  private async valueOf(id: IdentifierData, req: ApiRequest): Promise<JsonValue> {
    const res = await this.call(req)

    if (res.status !== 200) {
      throw new BackendError(`${req.endpoint} responded ${res.status}: ${res.text}`, {
        body: res.text,
        status: res.status,
        identifier: id.toString(),
      })
    }

    const body = this.deps.session.decode(res, req.endpoint)
    if (!isJsonObject(body) || !isJsonValue(body)) {
      throw new BackendError(`Malformed response from ${req.endpoint}`, {
        body: res.text,
        status: res.status,
        identifier: id.toString(),
      })
    }

    return body.value ?? null
  }
}
