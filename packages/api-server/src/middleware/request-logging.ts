import type { Logger } from "@layerconf/logger"
import type { MiddlewareHandler } from "hono"
import type { ApiEnv } from "../types"

/**
 * Policy:
 * - 5xx => error
 * - else => debug
 */
export function requestLoggingMiddleware(logger: Logger): MiddlewareHandler<ApiEnv> {
  return async (c, next) => {
    const start = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const meta = {
        requestId: c.get("requestId"),
        method: c.req.method,
        path: c.req.path,
        status,
        durationMs: Math.round(performance.now() - start),
      }

      if (status >= 500) {
        logger.error("Request completed", meta)
      } else {
        logger.debug("Request completed", meta)
      }
    }
  }
}
