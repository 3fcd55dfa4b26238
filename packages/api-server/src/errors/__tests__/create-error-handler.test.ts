import { BackendError, NotFoundError } from "@layerconf/errors"
import type { Logger } from "@layerconf/logger"
import { Hono } from "hono"
import { mock } from "vitest-mock-extended"
import { requestIdMiddleware } from "../../middleware/request-id"
import type { ApiEnv } from "../../types"
import { createErrorHandler } from "../create-error-handler"
import { configErrorMappings } from "../errors"

describe("createErrorHandler", () => {
  const appThrowing = (logger: Logger, err: unknown) => {
    const app = new Hono<ApiEnv>()
    app.use(requestIdMiddleware(() => "req-1"))
    app.get("/boom", () => {
      throw err
    })
    app.onError(createErrorHandler(configErrorMappings, logger))
    return app
  }

  it("logs server failures at error with the cause", async () => {
    const logger = mock<Logger>()
    const err = new BackendError("disk on fire")

    const res = await appThrowing(logger, err).request("/boom")

    expect(res.status).toBe(500)
    expect(logger.error).toHaveBeenCalledWith("Request failed", {
      requestId: "req-1",
      method: "GET",
      path: "/boom",
      status: 500,
      code: "backend_error",
      op: "GET /boom",
      err,
    })
    expect(logger.info).not.toHaveBeenCalled()
  })

  it("logs client failures at info and keeps the cause for debug", async () => {
    const logger = mock<Logger>()
    const err = new NotFoundError("music.1:GLOBAL")

    const res = await appThrowing(logger, err).request("/boom")

    expect(res.status).toBe(404)
    expect(logger.error).not.toHaveBeenCalled()
    expect(logger.info).toHaveBeenCalledWith("Request failed", {
      requestId: "req-1",
      method: "GET",
      path: "/boom",
      status: 404,
      code: "not_found",
      op: "GET /boom",
    })
    expect(logger.debug).toHaveBeenCalledWith(
      "Request failed details",
      expect.objectContaining({ err }),
    )
  })
})
