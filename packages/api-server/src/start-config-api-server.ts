import { serve } from "@hono/node-server"
import type { Logger } from "@layerconf/logger"
import type { ConfigApi } from "./types"

export type ConfigApiServerOptions = {
  app: ConfigApi
  port: number
  host: string
  logger: Logger
}

export type Closeable = {
  close(callback?: (err?: Error) => void): unknown
}

export function startConfigApiServer(options: ConfigApiServerOptions): Closeable {
  const server = serve({
    fetch: options.app.fetch,
    port: options.port,
    hostname: options.host,
  })

  options.logger.info(`Config API listening on http://${options.host}:${options.port}`)

  return server
}
