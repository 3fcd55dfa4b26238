import type { Logger } from "@layerconf/logger"
import { ApiBackend } from "./adapters/api/api-backend"
import { ApiSession, type FetchFn } from "./adapters/api/api-session"
import { JsonFileStore } from "./adapters/json-file/json-file-store"
import { MemoryStore } from "./adapters/memory/memory-store"
import { createPostgresStore } from "./adapters/postgres/create"
import { createRedisStore } from "./adapters/redis/create"
import type { StorageDetails } from "./config/storage-details"
import { selectJsonEncoder } from "./core/codec/json-encoders"
import { PayloadCodec } from "./core/codec/payload-codec"
import { DocumentBackend } from "./core/document/document-backend"
import type { DocumentStore } from "./ports/document-store"
import type { StorageBackend } from "./ports/storage-backend"

export type CreateBackendDeps = {
  logger?: Logger
  /** Replaces the global `fetch` of the API backend. */
  fetch?: FetchFn
}

/**
 * Builds the backend for `details`. Nothing connects until `initialize()`.
 */
export function createBackend(details: StorageDetails, deps: CreateBackendDeps = {}): StorageBackend {
  if (details.type === "api") {
    return new ApiBackend({
      createSession: () =>
        new ApiSession(
          {
            codec: new PayloadCodec(selectJsonEncoder(details.encoder)),
            ...(deps.fetch !== undefined && { fetch: deps.fetch }),
          },
          { baseUrl: details.host, token: details.password },
        ),
      ...(deps.logger !== undefined && { logger: deps.logger }),
    })
  }

  return new DocumentBackend({
    store: createStore(details),
    ...(deps.logger !== undefined && { logger: deps.logger }),
  })
}

function createStore(details: Exclude<StorageDetails, { type: "api" }>): DocumentStore {
  switch (details.type) {
    case "json":
      return new JsonFileStore({ rootDir: details.path })
    case "postgres":
      return createPostgresStore(
        { connectionString: details.connectionString },
        details.table !== undefined ? { table: details.table } : {},
      )
    case "redis":
      return createRedisStore(
        {
          host: details.host,
          port: details.port,
          database: details.database,
          ...(details.password !== null && { password: details.password }),
        },
        { keyspacePrefix: details.keyPrefix },
      )
    case "memory":
      return new MemoryStore()
  }
}
