import { BackendError } from "@layerconf/errors"
import type { DocumentStore } from "../../ports/document-store"
import { isJsonObject, type JsonObject } from "../../ports/json-value"
import type { Namespace } from "../../ports/namespace"
import type { PgPool, PgQueryResult } from "./pg-client"

export type PostgresStoreOptions = {
  /** @default "layerconf_documents" */
  table?: string
  /** End the pool on close. @default true */
  ownsPool?: boolean
}

export type PostgresStoreDeps = {
  pool: PgPool
}

const TABLE_NAME = /^[a-z_][a-z0-9_]*$/

export class PostgresStore implements DocumentStore {
  readonly name = "postgres"
  private readonly table: string

  constructor(
    private readonly deps: PostgresStoreDeps,
    private readonly opts: PostgresStoreOptions = {},
  ) {
    const table = opts.table ?? "layerconf_documents"

    if (!TABLE_NAME.test(table)) {
      throw new RangeError(`Invalid table name: ${table}`)
    }
    this.table = table
  }

  async open(): Promise<void> {
    await this.deps.pool.query(
      `create table if not exists ${this.table} (
        cog_name text not null,
        uuid text not null,
        document jsonb not null,
        primary key (cog_name, uuid)
      )`,
    )
  }

  async close(): Promise<void> {
    if (this.opts.ownsPool ?? true) {
      await this.deps.pool.end()
    }
  }

  async read(ns: Namespace): Promise<JsonObject | undefined> {
    const res = await this.deps.pool.query(
      `select document from ${this.table} where cog_name = $1 and uuid = $2`,
      [ns.cogName, ns.uuid],
    )

    return this.documentOf(res)
  }

  /**
   * Runs inside a transaction holding the row lock, so writers in other
   * processes wait for this one.
   */
  async mutate<T>(ns: Namespace, fn: (doc: JsonObject) => T): Promise<T> {
    const client = await this.deps.pool.connect()

    try {
      await client.query("begin")

      const res = await client.query(
        `select document from ${this.table} where cog_name = $1 and uuid = $2 for update`,
        [ns.cogName, ns.uuid],
      )
      const draft = this.documentOf(res) ?? {}
      const result = fn(draft)

      if (Object.keys(draft).length === 0) {
        await client.query(`delete from ${this.table} where cog_name = $1 and uuid = $2`, [
          ns.cogName,
          ns.uuid,
        ])
      } else {
        await client.query(
          `insert into ${this.table} (cog_name, uuid, document) values ($1, $2, $3::jsonb)
           on conflict (cog_name, uuid) do update set document = excluded.document`,
          [ns.cogName, ns.uuid, JSON.stringify(draft)],
        )
      }

      await client.query("commit")

      return result
    } catch (err) {
      await client.query("rollback")
      throw err
    } finally {
      client.release()
    }
  }

  async deleteAll(): Promise<void> {
    await this.deps.pool.query(`delete from ${this.table}`)
  }

  async *namespaces(): AsyncGenerator<Namespace> {
    const res = await this.deps.pool.query(
      `select cog_name, uuid from ${this.table} order by cog_name, uuid`,
    )

    for (const row of res.rows) {
      const { cog_name: cogName, uuid } = row

      if (typeof cogName === "string" && typeof uuid === "string") {
        yield { cogName, uuid }
      }
    }
  }

  private documentOf(res: PgQueryResult): JsonObject | undefined {
    const row = res.rows[0]
    if (!row) return undefined

    const document = row.document
    if (!isJsonObject(document)) {
      throw new BackendError(`Stored document is not an object (${this.table})`)
    }

    return document
  }
}
