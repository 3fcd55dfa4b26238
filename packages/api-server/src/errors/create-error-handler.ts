import type { ErrorCode } from "@layerconf/errors"
import type { Logger } from "@layerconf/logger"
import type { ErrorHandler } from "hono"
import type { ContentfulStatusCode } from "hono/utils/http-status"
import type { ApiEnv } from "../types"
import { createErrorFormatter, type ErrorMappingsConfig } from "./errors"

export function createErrorHandler(
  mappings: ErrorMappingsConfig,
  logger: Logger,
): ErrorHandler<ApiEnv> {
  const formatter = createErrorFormatter(mappings)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const response = formatter(err, requestId)

    logError(logger, err, {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: response.error.status,
      code: response.error.code,
    })

    return c.json(response, response.error.status)
  }
}

type ErrorLogMeta = {
  requestId: string
  method: string
  path: string
  status: ContentfulStatusCode
  code: ErrorCode
}

/**
 * - 5xx => error with `err`
 * - 4xx => info without `err`, debug with `err`
 */
function logError(logger: Logger, err: unknown, meta: ErrorLogMeta): void {
  const base = { ...meta, op: `${meta.method} ${meta.path}` }

  if (meta.status >= 500) {
    logger.error("Request failed", { ...base, err })
    return
  }

  logger.info("Request failed", base)
  logger.debug("Request failed details", { ...base, err })
}
