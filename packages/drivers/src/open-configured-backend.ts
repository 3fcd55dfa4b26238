import { createPinoLogger, type Logger, type LoggerOptions } from "@layerconf/logger"
import {
  type LoadStorageConfigOptions,
  loadStorageConfig,
  type StorageConfig,
} from "./config/load-storage-config"
import { type CreateBackendDeps, createBackend } from "./create-backend"
import type { StorageBackend } from "./ports/storage-backend"

export type OpenConfiguredBackendOptions = LoadStorageConfigOptions & {
  /** @default createPinoLogger */
  createLogger?: (opts: LoggerOptions) => Logger
  fetch?: CreateBackendDeps["fetch"]
}

export type ConfiguredBackend = {
  backend: StorageBackend
  logger: Logger
  config: StorageConfig
}

/**
 * Loads the storage settings, builds the logger from `LOG_LEVEL` and
 * `LOG_PRETTY`, then creates the backend it selects. The backend is not
 * initialized.
 */
export async function openConfiguredBackend(
  opts: OpenConfiguredBackendOptions = {},
): Promise<ConfiguredBackend> {
  const { createLogger = createPinoLogger, fetch, ...loadOpts } = opts
  const config = await loadStorageConfig(loadOpts)
  const logger = createLogger({ level: config.log.level, prettify: config.log.prettify })

  logger.info("Storage configured", { type: config.storage.type, sources: config.sources })

  const backend = createBackend(config.storage, {
    logger,
    ...(fetch !== undefined && { fetch }),
  })
  return { backend, logger, config }
}
