import { NotFoundError, TypeMismatchError } from "@layerconf/errors"
import { type Lock, withLock } from "@layerconf/lock"
import type { Logger } from "@layerconf/logger"
import type { ConfigDriver, ImportReport, ImportRow } from "../../ports/config-driver"
import type { DocumentStore } from "../../ports/document-store"
import type { JsonObject, JsonValue } from "../../ports/json-value"
import { namespaceKey } from "../../ports/namespace"
import type { CustomGroupData } from "../identifier/categories"
import type { IdentifierData } from "../identifier/identifier-data"
import { importData } from "../migration/import-data"
import { clearAt, cloneJson, getAt, setAt } from "./path-ops"

export type DocumentDriverDeps = {
  store: DocumentStore
  lock: Lock
  logger: Logger
  /** Throws `BackendNotReadyError` once the owning backend is not ready. */
  assertReady: () => void
}

/**
 * Config driver over a one-document-per-namespace store. Every mutation is a
 * read-modify-write of the whole document, serialized per namespace.
 */
export class DocumentDriver implements ConfigDriver {
  private readonly lockKey: string

  constructor(
    private readonly deps: DocumentDriverDeps,
    readonly cogName: string,
    readonly uuid: string,
  ) {
    this.lockKey = `${deps.store.name}:${namespaceKey({ cogName, uuid })}`
  }

  async get(id: IdentifierData): Promise<JsonValue> {
    this.check(id)

    const doc = await this.deps.store.read(id.namespace)
    const found = doc ? getAt(doc, id.documentPath) : { kind: "not_found" as const }

    if (found.kind === "not_found") {
      throw new NotFoundError(id.toString())
    }

    return cloneJson(found.value)
  }

  async set(id: IdentifierData, value: JsonValue): Promise<JsonValue> {
    const stored = cloneJson(value)

    await this.mutate(id, (doc) => setAt(doc, id.documentPath, stored))

    return cloneJson(stored)
  }

  async clear(id: IdentifierData): Promise<void> {
    await this.mutate(id, (doc) => clearAt(doc, id.documentPath))
  }

  async increment(id: IdentifierData, delta: number, defaultValue = 0): Promise<number> {
    return this.mutate(id, (doc) => {
      const found = getAt(doc, id.documentPath)
      const current = found.kind === "found" ? found.value : defaultValue

      if (typeof current !== "number") {
        throw new TypeMismatchError(id.toString(), "number", current)
      }

      const next = current + delta
      setAt(doc, id.documentPath, next)

      return next
    })
  }

  async toggle(id: IdentifierData, value?: boolean, defaultValue = false): Promise<boolean> {
    return this.mutate(id, (doc) => {
      const found = getAt(doc, id.documentPath)

      if (found.kind === "found" && typeof found.value !== "boolean") {
        throw new TypeMismatchError(id.toString(), "boolean", found.value)
      }

      const current = found.kind === "found" ? found.value : defaultValue
      const next = value ?? !current
      setAt(doc, id.documentPath, next)

      return next
    })
  }

  async importData(
    rows: Iterable<ImportRow>,
    customGroups: CustomGroupData = {},
  ): Promise<ImportReport> {
    this.deps.assertReady()

    return importData({ driver: this, logger: this.deps.logger }, rows, customGroups)
  }

  private async mutate<T>(id: IdentifierData, fn: (doc: JsonObject) => T): Promise<T> {
    this.check(id)

    return withLock(this.deps.lock, this.lockKey, () => this.deps.store.mutate(id.namespace, fn))
  }

  private check(id: IdentifierData): void {
    this.deps.assertReady()

    if (id.cogName !== this.cogName || id.uuid !== this.uuid) {
      throw new RangeError(
        `Identifier ${id.toString()} does not belong to ${namespaceKey(this)}`,
      )
    }
  }
}
