import { createClient, type RedisClientOptions } from "redis"
import type { RedisDocumentClient } from "./redis-client"
import { RedisStore, type RedisStoreOptions } from "./redis-store"

export type RedisConnection = {
  host: string
  port: number
  password?: string
  database?: number
}

export function createRedisClient(connection: RedisConnection): RedisDocumentClient {
  const options: RedisClientOptions = {
    socket: { host: connection.host, port: connection.port },
    ...(connection.password !== undefined && { password: connection.password }),
    ...(connection.database !== undefined && { database: connection.database }),
  }

  return createClient(options) as unknown as RedisDocumentClient
}

export function createRedisStore(
  connection: RedisConnection,
  opts: RedisStoreOptions,
): RedisStore {
  return new RedisStore({ client: createRedisClient(connection) }, opts)
}
