import { BackendError, BaseError, NotFoundError } from "@layerconf/errors"
import { configErrorMappings, createErrorFormatter } from "../errors"

describe("createErrorFormatter", () => {
  const format = createErrorFormatter(configErrorMappings)

  it("keeps the message of mapped operational errors", () => {
    expect(format(new NotFoundError("music.1:GLOBAL"), "r1")).toStrictEqual({
      error: { code: "not_found", status: 404, message: "No value stored at music.1:GLOBAL", requestId: "r1" },
    })
  })

  it("uses the mapped message when one is configured", () => {
    const err = new BaseError("token mismatch", { code: "unauthorized" })

    expect(format(err, "r1").error).toStrictEqual({
      code: "unauthorized",
      status: 401,
      message: "Invalid or missing credentials",
      requestId: "r1",
    })
  })

  it("hides unmapped errors behind the fallback but keeps the code", () => {
    expect(format(new BackendError("disk on fire"), "r1").error).toStrictEqual({
      code: "backend_error",
      status: 500,
      message: "An unexpected error occurred",
      requestId: "r1",
    })
  })

  it("falls back entirely for non-app errors", () => {
    expect(format(new Error("boom"), "r1").error).toStrictEqual({
      code: "internal_error",
      status: 500,
      message: "An unexpected error occurred",
      requestId: "r1",
    })
  })
})
