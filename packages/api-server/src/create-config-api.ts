import type { StorageBackend } from "@layerconf/drivers"
import { createNullLogger, type Logger } from "@layerconf/logger"
import { Hono } from "hono"
import { createErrorHandler } from "./errors/create-error-handler"
import { configErrorMappings, type ErrorMappingsConfig } from "./errors/errors"
import { bearerTokenMiddleware } from "./middleware/bearer-token"
import { requestIdMiddleware } from "./middleware/request-id"
import { requestLoggingMiddleware } from "./middleware/request-logging"
import { registerConfigRoutes } from "./routes/config-routes"
import type { ApiEnv, ConfigApi } from "./types"

export type ConfigApiOptions = {
  /** Must be initialized before requests arrive. */
  backend: StorageBackend
  /** Bearer token clients must send; `null` accepts every request. */
  token: string | null
  logger?: Logger
  errorMappings?: ErrorMappingsConfig
  generateRequestId?: () => string
}

export function createConfigApi(options: ConfigApiOptions): ConfigApi {
  const logger = (options.logger ?? createNullLogger()).child({ service: "config-api" })
  const app = new Hono<ApiEnv>()

  app.use(requestIdMiddleware(options.generateRequestId))
  app.use(requestLoggingMiddleware(logger))
  app.use("/config/*", bearerTokenMiddleware(options.token))

  registerConfigRoutes(app, options.backend)

  app.notFound((c) =>
    c.json(
      {
        error: {
          code: "route_not_found",
          status: 404,
          message: `No route for ${c.req.method} ${c.req.path}`,
          requestId: c.get("requestId"),
        },
      },
      404,
    ),
  )
  app.onError(createErrorHandler(options.errorMappings ?? configErrorMappings, logger))

  return app
}
