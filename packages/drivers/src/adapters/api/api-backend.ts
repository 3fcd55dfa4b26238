import { BackendError, ConfirmationRequiredError } from "@layerconf/errors"
import { createNullLogger, type Logger } from "@layerconf/logger"
import { BackendLifecycle } from "../../core/lifecycle/backend-lifecycle"
import type { ConfigDriver, DeleteAllOptions } from "../../ports/config-driver"
import { isJsonObject } from "../../ports/json-value"
import type { Namespace } from "../../ports/namespace"
import type { BackendState, StorageBackend } from "../../ports/storage-backend"
import { ApiDriver, ApiEndpoint } from "./api-driver"
import type { ApiSession } from "./api-session"

export type ApiBackendDeps = {
  /** Built lazily by `initialize()` so nothing is held before start-up. */
  createSession: () => ApiSession
  logger?: Logger
}

export class ApiBackend implements StorageBackend {
  readonly name = "api"
  private readonly lifecycle = new BackendLifecycle("api")
  private readonly logger: Logger
  private session: ApiSession | undefined

  constructor(private readonly deps: ApiBackendDeps) {
    this.logger = (deps.logger ?? createNullLogger()).child({ backend: "api" })
  }

  get state(): BackendState {
    return this.lifecycle.state
  }

  async initialize(): Promise<void> {
    await this.lifecycle.start(async () => {
      this.session = this.deps.createSession()
    })
    this.logger.debug("Backend initialized", { baseUrl: this.requireSession().baseUrl })
  }

  async teardown(): Promise<void> {
    await this.lifecycle.stop(async () => {
      this.session = undefined
    })
  }

  getDriver(cogName: string, uuid: string): ConfigDriver {
    return new ApiDriver(
      {
        session: this.requireSession(),
        logger: this.logger,
        assertReady: () => this.lifecycle.assertReady(),
      },
      cogName,
      uuid,
    )
  }

  async deleteAllData(opts: DeleteAllOptions = {}): Promise<void> {
    if (opts.confirm !== true) {
      throw new ConfirmationRequiredError("deleteAllData")
    }

    const session = this.requireSession()
    const res = await session.send({
      method: "PUT",
      endpoint: ApiEndpoint.clearAll,
      query: { i_want_to_do_this: "true" },
    })

    if (res.status !== 200) {
      throw new BackendError(`${ApiEndpoint.clearAll} responded ${res.status}: ${res.text}`, {
        body: res.text,
        status: res.status,
      })
    }
    this.logger.warn("Deleted all stored data")
  }

  async *namespaces(): AsyncGenerator<Namespace> {
    const session = this.requireSession()
    const res = await session.send({ method: "POST", endpoint: ApiEndpoint.cogs })

    if (res.status !== 200) {
      throw new BackendError(`${ApiEndpoint.cogs} responded ${res.status}: ${res.text}`, {
        body: res.text,
        status: res.status,
      })
    }

    const body = session.decode(res, ApiEndpoint.cogs)
    const pairs = isJsonObject(body) ? body.value : undefined

    if (!Array.isArray(pairs)) {
      throw new BackendError(`Malformed response from ${ApiEndpoint.cogs}`, {
        body: res.text,
        status: res.status,
      })
    }

    for (const pair of pairs) {
      const [cogName, uuid] = Array.isArray(pair) ? pair : []

      if (typeof cogName !== "string" || typeof uuid !== "string") {
        throw new BackendError(`Malformed namespace entry from ${ApiEndpoint.cogs}`, {
          body: res.text,
          status: res.status,
        })
      }

      yield { cogName, uuid }
    }
  }

  private requireSession(): ApiSession {
    this.lifecycle.assertReady()

    if (!this.session) {
      throw new BackendError("API session missing while backend is ready")
    }

    return this.session
  }
}
