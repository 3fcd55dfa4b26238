import type { ConfigDriver, DeleteAllOptions } from "./config-driver"
import type { Namespace } from "./namespace"

export type BackendState = "created" | "initializing" | "ready" | "closing" | "closed"

/**
 * Owns the process-wide resources of one storage technology (pool, client,
 * HTTP session) and hands out drivers bound to a namespace.
 *
 * Construct once, `initialize()`, pass the handle to every call site,
 * `teardown()` on shutdown.
 */
export interface StorageBackend {
  readonly name: string
  readonly state: BackendState

  initialize(): Promise<void>
  teardown(): Promise<void>

  getDriver(cogName: string, uuid: string): ConfigDriver

  /** Rejects with `ConfirmationRequiredError` before any I/O unless `confirm` is true. */
  deleteAllData(opts?: DeleteAllOptions): Promise<void>

  /** Every namespace holding data. Lazy and single-pass. */
  namespaces(): AsyncGenerator<Namespace>
}
