import { Pool, type PoolConfig } from "pg"
import type { PgPool } from "./pg-client"
import { PostgresStore, type PostgresStoreOptions } from "./postgres-store"

export type PostgresStoreConnection = { connectionString: string } & Omit<
  PoolConfig,
  "connectionString"
>

export function createPgPool(options: PostgresStoreConnection): PgPool {
  return new Pool(options)
}

export function createPostgresStore(
  connection: PostgresStoreConnection,
  opts: PostgresStoreOptions = {},
): PostgresStore {
  return new PostgresStore({ pool: createPgPool(connection) }, { ...opts, ownsPool: true })
}
