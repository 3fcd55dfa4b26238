import type { Hono } from "hono"

export type ApiEnv = {
  Variables: {
    requestId: string
  }
}

export type ConfigApi = Hono<ApiEnv>
