import { BackendError } from "@layerconf/errors"
import type { DocumentStore } from "../../ports/document-store"
import { isJsonObject, type JsonObject } from "../../ports/json-value"
import type { Namespace } from "../../ports/namespace"
import type { RedisDocumentClient } from "./redis-client"

export type RedisStoreOptions = {
  /** Prepended to every key this store touches. */
  keyspacePrefix: string
}

export type RedisStoreDeps = {
  client: RedisDocumentClient
}

/**
 * One JSON string per namespace at `<prefix><cogName>:<uuid>` (both parts
 * URI-encoded, so neither can contain the separator), plus a set at
 * `<prefix>__namespaces__` listing the namespaces that hold data.
 */
export class RedisStore implements DocumentStore {
  readonly name = "redis"

  constructor(
    private readonly deps: RedisStoreDeps,
    private readonly opts: RedisStoreOptions,
  ) {}

  async open(): Promise<void> {
    if (!this.deps.client.isOpen) {
      await this.deps.client.connect()
    }
  }

  async close(): Promise<void> {
    if (this.deps.client.isOpen) {
      await this.deps.client.quit()
    }
  }

  async read(ns: Namespace): Promise<JsonObject | undefined> {
    const key = this.documentKey(ns)
    const raw = await this.deps.client.get(key)
    if (raw === null) return undefined

    return this.parse(key, raw)
  }

  async mutate<T>(ns: Namespace, fn: (doc: JsonObject) => T): Promise<T> {
    const draft = (await this.read(ns)) ?? {}
    const result = fn(draft)

    const key = this.documentKey(ns)
    const tx = this.deps.client.multi()

    if (Object.keys(draft).length === 0) {
      tx.del(key).sRem(this.namespacesKey(), this.member(ns))
    } else {
      tx.set(key, JSON.stringify(draft)).sAdd(this.namespacesKey(), this.member(ns))
    }
    await tx.exec()

    return result
  }

  async deleteAll(): Promise<void> {
    const members = await this.deps.client.sMembers(this.namespacesKey())
    const keys = members.flatMap((m) => {
      const ns = this.parseMember(m)
      return ns ? [this.documentKey(ns)] : []
    })

    await this.deps.client.del([...keys, this.namespacesKey()])
  }

  async *namespaces(): AsyncGenerator<Namespace> {
    const members = await this.deps.client.sMembers(this.namespacesKey())

    for (const member of members.sort()) {
      const ns = this.parseMember(member)
      if (ns) yield ns
    }
  }

  private documentKey(ns: Namespace): string {
    return `${this.opts.keyspacePrefix}${encodeURIComponent(ns.cogName)}:${encodeURIComponent(ns.uuid)}`
  }

  private namespacesKey(): string {
    return `${this.opts.keyspacePrefix}__namespaces__`
  }

  private member(ns: Namespace): string {
    return JSON.stringify([ns.cogName, ns.uuid])
  }

  private parseMember(member: string): Namespace | undefined {
    const parsed: unknown = JSON.parse(member)

    if (
      Array.isArray(parsed) &&
      parsed.length === 2 &&
      typeof parsed[0] === "string" &&
      typeof parsed[1] === "string"
    ) {
      return { cogName: parsed[0], uuid: parsed[1] }
    }

    return undefined
  }

  private parse(key: string, raw: string): JsonObject {
    let parsed: unknown

    try {
      parsed = JSON.parse(raw)
    } catch (err) {
      throw new BackendError(`Corrupt document at ${key}`, { cause: err })
    }

    if (!isJsonObject(parsed)) {
      throw new BackendError(`Document at ${key} is not an object`)
    }

    return parsed
  }
}
