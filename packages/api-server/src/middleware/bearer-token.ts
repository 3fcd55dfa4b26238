import { timingSafeEqual } from "node:crypto"
import type { MiddlewareHandler } from "hono"
import { UnauthorizedError } from "../errors/unauthorized-error"
import type { ApiEnv } from "../types"

/**
 * Requires `Authorization: Bearer <token>`. A `null` token disables the check.
 */
export function bearerTokenMiddleware(token: string | null): MiddlewareHandler<ApiEnv> {
  const expected = token === null ? null : Buffer.from(`Bearer ${token}`)

  return async (c, next) => {
    if (expected !== null) {
      const given = Buffer.from(c.req.header("authorization") ?? "")

      if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
        throw new UnauthorizedError()
      }
    }

    await next()
  }
}
