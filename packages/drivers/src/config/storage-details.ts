import type { JsonEncoderName } from "../ports/json-encoder"

export type JsonStorageDetails = { type: "json"; path: string }

export type PostgresStorageDetails = {
  type: "postgres"
  connectionString: string
  table?: string
}

export type RedisStorageDetails = {
  type: "redis"
  host: string
  port: number
  password: string | null
  database: number
  keyPrefix: string
}

export type ApiStorageDetails = {
  type: "api"
  host: string
  password: string | null
  encoder: JsonEncoderName
}

export type MemoryStorageDetails = { type: "memory" }

export type StorageDetails =
  | JsonStorageDetails
  | PostgresStorageDetails
  | RedisStorageDetails
  | ApiStorageDetails
  | MemoryStorageDetails

export type StorageType = StorageDetails["type"]
