import { randomUUID } from "node:crypto"
import type { MiddlewareHandler } from "hono"
import type { ApiEnv } from "../types"

const HEADER = "x-request-id"

/**
 * Reuses an incoming `x-request-id` or generates one, and mirrors it onto
 * the response.
 */
export function requestIdMiddleware(generate: () => string = randomUUID): MiddlewareHandler<ApiEnv> {
  return async (c, next) => {
    const incoming = c.req.header(HEADER)
    const requestId = incoming !== undefined && incoming.trim() !== "" ? incoming : generate()

    c.set("requestId", requestId)

    await next()

    if (!c.res.headers.has(HEADER)) {
      c.res.headers.set(HEADER, requestId)
    }
  }
}
