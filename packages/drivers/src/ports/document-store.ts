import type { JsonObject } from "./json-value"
import type { Namespace } from "./namespace"

/**
 * Persists one JSON document per namespace.
 *
 * `mutate` hands `fn` a private copy of the current document (empty when
 * absent); the store persists the copy after `fn` returns, or removes the
 * namespace when the copy ends up empty. When `fn` throws nothing is written.
 */
export interface DocumentStore {
  readonly name: string

  open(): Promise<void>
  close(): Promise<void>

  read(ns: Namespace): Promise<JsonObject | undefined>
  mutate<T>(ns: Namespace, fn: (doc: JsonObject) => T): Promise<T>

  deleteAll(): Promise<void>
  namespaces(): AsyncGenerator<Namespace>
}
