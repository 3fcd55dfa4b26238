export { ApiBackend, type ApiBackendDeps } from "./adapters/api/api-backend"
export {
  type ApiDetails,
  DEFAULT_API_HOST,
  NO_PASSWORD,
  normalizeApiDetails,
} from "./adapters/api/api-details"
export { ApiDriver, type ApiDriverDeps, ApiEndpoint } from "./adapters/api/api-driver"
export {
  type ApiRequest,
  type ApiResponse,
  ApiSession,
  type ApiSessionDeps,
  type ApiSessionOptions,
  type FetchFn,
} from "./adapters/api/api-session"
export {
  JsonFileStore,
  type JsonFileStoreDeps,
  type JsonFileStoreOptions,
} from "./adapters/json-file/json-file-store"
export { MemoryStore } from "./adapters/memory/memory-store"
export {
  createPgPool,
  createPostgresStore,
  type PostgresStoreConnection,
} from "./adapters/postgres/create"
export type { PgPool, PgPoolClient, PgQueryable, PgQueryResult } from "./adapters/postgres/pg-client"
export {
  PostgresStore,
  type PostgresStoreDeps,
  type PostgresStoreOptions,
} from "./adapters/postgres/postgres-store"
export { createRedisClient, createRedisStore, type RedisConnection } from "./adapters/redis/create"
export type { RedisDocumentClient, RedisMulti } from "./adapters/redis/redis-client"
export { RedisStore, type RedisStoreDeps, type RedisStoreOptions } from "./adapters/redis/redis-store"
export {
  type LoadStorageConfigOptions,
  loadStorageConfig,
  MissingStorageSettingError,
  type StorageConfig,
  type StorageEnv,
  storageEnvSchema,
  toStorageDetails,
} from "./config/load-storage-config"
export type {
  ApiStorageDetails,
  JsonStorageDetails,
  MemoryStorageDetails,
  PostgresStorageDetails,
  RedisStorageDetails,
  StorageDetails,
  StorageType,
} from "./config/storage-details"
export { bytesJsonEncoder, selectJsonEncoder, textJsonEncoder } from "./core/codec/json-encoders"
export { PayloadCodec } from "./core/codec/payload-codec"
export { DocumentBackend, type DocumentBackendDeps } from "./core/document/document-backend"
export { DocumentDriver, type DocumentDriverDeps } from "./core/document/document-driver"
export {
  ConfigCategory,
  type CustomGroupData,
  getPrimaryKeyInfo,
  isConfigCategory,
  type PrimaryKeyInfo,
} from "./core/identifier/categories"
export { type IdentifierFor, identifierFor } from "./core/identifier/create-identifier"
export { IdentifierData, type IdentifierDataInit } from "./core/identifier/identifier-data"
export { importData, type ImportDataDeps, MalformedPayloadError } from "./core/migration/import-data"
export { type SplitLeaf, splitByArity } from "./core/migration/split-by-arity"
export { type CreateBackendDeps, createBackend } from "./create-backend"
export {
  type ConfiguredBackend,
  type OpenConfiguredBackendOptions,
  openConfiguredBackend,
} from "./open-configured-backend"
export type {
  CategoryImport,
  ConfigDriver,
  DeleteAllOptions,
  FailedLeaf,
  ImportReport,
  ImportRow,
} from "./ports/config-driver"
export type { DocumentStore } from "./ports/document-store"
export type { JsonEncoder, JsonEncoderName } from "./ports/json-encoder"
export {
  defineValue,
  isJsonObject,
  isJsonValue,
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
  ownValue,
} from "./ports/json-value"
export { type Namespace, namespaceKey } from "./ports/namespace"
export type { BackendState, StorageBackend } from "./ports/storage-backend"
