import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  loadConfig,
  ObjectSource,
  type ObjectSourceValue,
} from "@layerconf/config"
import { BaseError } from "@layerconf/errors"
import { logLevelNames } from "@layerconf/logger"
import { z } from "zod"
import { NO_PASSWORD, normalizeApiDetails } from "../adapters/api/api-details"
import type { StorageDetails } from "./storage-details"

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1")

export const storageEnvSchema = z.object({
  STORAGE_TYPE: z.enum(["json", "postgres", "redis", "api", "memory"]).default("json"),

  STORAGE_JSON_PATH: z.string().min(1).default("./data"),

  POSTGRES_URL: z.string().min(1).optional(),
  POSTGRES_TABLE: z.string().min(1).optional(),

  REDIS_HOST: z.string().min(1).default("localhost"),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_PASSWORD: z.string().default(NO_PASSWORD),
  REDIS_DATABASE: z.coerce.number().int().min(0).default(0),
  REDIS_KEY_PREFIX: z.string().default("layerconf:"),

  API_HOST: z.string().optional(),
  API_PASSWORD: z.string().optional(),
  API_JSON_ENCODER: z.enum(["bytes", "text"]).default("bytes"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: booleanFlag.default(false),
})

export type StorageEnv = z.infer<typeof storageEnvSchema>

export type StorageConfig = {
  storage: StorageDetails
  log: { level: StorageEnv["LOG_LEVEL"]; prettify: boolean }
  /** Sources that supplied at least one setting, in application order. */
  sources: string[]
}

export type LoadStorageConfigOptions = {
  /** @default [DotenvSource(".env", optional), EnvSource(storage keys)] */
  sources?: ConfigSource[]
  cwd?: string
  /** Environment prefix, e.g. `LAYERCONF_`, preferred over the bare names. */
  envPrefix?: string
  /** Applied after every other source. */
  overrides?: Readonly<Partial<Record<keyof StorageEnv, ObjectSourceValue>>>
}

export class MissingStorageSettingError extends BaseError<"missing_setting"> {
  constructor(setting: string, storageType: string) {
    super(`${setting} is required when STORAGE_TYPE=${storageType}`, {
      code: "missing_setting",
      context: { setting, storageType },
    })
  }
}

export function toStorageDetails(env: StorageEnv): StorageDetails {
  switch (env.STORAGE_TYPE) {
    case "json":
      return { type: "json", path: env.STORAGE_JSON_PATH }
    case "postgres":
      if (env.POSTGRES_URL === undefined) {
        throw new MissingStorageSettingError("POSTGRES_URL", env.STORAGE_TYPE)
      }
      return {
        type: "postgres",
        connectionString: env.POSTGRES_URL,
        ...(env.POSTGRES_TABLE !== undefined && { table: env.POSTGRES_TABLE }),
      }
    case "redis":
      return {
        type: "redis",
        host: env.REDIS_HOST,
        port: env.REDIS_PORT,
        password: env.REDIS_PASSWORD === NO_PASSWORD ? null : env.REDIS_PASSWORD,
        database: env.REDIS_DATABASE,
        keyPrefix: env.REDIS_KEY_PREFIX,
      }
    case "api": {
      const details = normalizeApiDetails({
        ...(env.API_HOST !== undefined && { host: env.API_HOST }),
        ...(env.API_PASSWORD !== undefined && { password: env.API_PASSWORD }),
      })
      return { type: "api", ...details, encoder: env.API_JSON_ENCODER }
    }
    case "memory":
      return { type: "memory" }
  }
}

export async function loadStorageConfig(
  opts: LoadStorageConfigOptions = {},
): Promise<StorageConfig> {
  const sources: ConfigSource[] = [
    ...(opts.sources ?? [
      new DotenvSource({ file: ".env", required: false, ...(opts.cwd !== undefined && { cwd: opts.cwd }) }),
      new EnvSource({
        keys: Object.keys(storageEnvSchema.shape),
        ...(opts.envPrefix !== undefined && { prefix: opts.envPrefix }),
      }),
    ]),
  ]
  if (opts.overrides !== undefined) {
    sources.push(new ObjectSource(opts.overrides))
  }

  const config = await loadConfig({ schema: storageEnvSchema, sources })
  const env = config.value

  return {
    storage: toStorageDetails(env),
    log: { level: env.LOG_LEVEL, prettify: env.LOG_PRETTY },
    sources: config.sourcesUsed(),
  }
}
