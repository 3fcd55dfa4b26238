import { cloneJson } from "../../core/document/path-ops"
import type { DocumentStore } from "../../ports/document-store"
import type { JsonObject } from "../../ports/json-value"
import type { Namespace } from "../../ports/namespace"

type Entry = { ns: Namespace; doc: JsonObject }

/**
 * Keeps documents in a Map. Data lives as long as the store instance.
 */
export class MemoryStore implements DocumentStore {
  readonly name = "memory"
  private readonly docs = new Map<string, Entry>()

  async open(): Promise<void> {}

  async close(): Promise<void> {}

  async read(ns: Namespace): Promise<JsonObject | undefined> {
    const entry = this.docs.get(storageKey(ns))

    return entry ? cloneJson(entry.doc) : undefined
  }

  async mutate<T>(ns: Namespace, fn: (doc: JsonObject) => T): Promise<T> {
    const key = storageKey(ns)
    const draft = cloneJson(this.docs.get(key)?.doc ?? {})
    const result = fn(draft)

    if (Object.keys(draft).length === 0) {
      this.docs.delete(key)
    } else {
      this.docs.set(key, { ns: { cogName: ns.cogName, uuid: ns.uuid }, doc: draft })
    }

    return result
  }

  async deleteAll(): Promise<void> {
    this.docs.clear()
  }

  async *namespaces(): AsyncGenerator<Namespace> {
    for (const { ns } of [...this.docs.values()]) {
      yield { ...ns }
    }
  }
}

function storageKey(ns: Namespace): string {
  return JSON.stringify([ns.cogName, ns.uuid])
}
