import { ConfirmationRequiredError } from "@layerconf/errors"
import { createMemoryLock, type Lock } from "@layerconf/lock"
import { createNullLogger, type Logger } from "@layerconf/logger"
import type { ConfigDriver, DeleteAllOptions } from "../../ports/config-driver"
import type { DocumentStore } from "../../ports/document-store"
import type { Namespace } from "../../ports/namespace"
import type { BackendState, StorageBackend } from "../../ports/storage-backend"
import { BackendLifecycle } from "../lifecycle/backend-lifecycle"
import { DocumentDriver } from "./document-driver"

export type DocumentBackendDeps = {
  store: DocumentStore
  lock?: Lock
  logger?: Logger
}

export class DocumentBackend implements StorageBackend {
  private readonly lifecycle: BackendLifecycle
  private readonly lock: Lock
  private readonly logger: Logger

  constructor(private readonly deps: DocumentBackendDeps) {
    this.lifecycle = new BackendLifecycle(deps.store.name)
    this.lock = deps.lock ?? createMemoryLock()
    this.logger = (deps.logger ?? createNullLogger()).child({ backend: deps.store.name })
  }

  get name(): string {
    return this.deps.store.name
  }

  get state(): BackendState {
    return this.lifecycle.state
  }

  async initialize(): Promise<void> {
    await this.lifecycle.start(() => this.deps.store.open())
    this.logger.debug("Backend initialized")
  }

  async teardown(): Promise<void> {
    await this.lifecycle.stop(() => this.deps.store.close())
    this.logger.debug("Backend closed")
  }

  getDriver(cogName: string, uuid: string): ConfigDriver {
    this.lifecycle.assertReady()

    return new DocumentDriver(
      {
        store: this.deps.store,
        lock: this.lock,
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
    this.lifecycle.assertReady()

    await this.deps.store.deleteAll()
    this.logger.warn("Deleted all stored data")
  }

  async *namespaces(): AsyncGenerator<Namespace> {
    this.lifecycle.assertReady()

    yield* this.deps.store.namespaces()
  }
}
