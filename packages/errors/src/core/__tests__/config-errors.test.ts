import { BaseError, serializeError } from "../base-error"
import {
  BackendError,
  ConfirmationRequiredError,
  NotFoundError,
  TypeMismatchError,
} from "../config-errors"
import { isAppError } from "../utils/is-app-error"

describe("config errors", () => {
  it("NotFoundError carries the identifier", () => {
    const err = new NotFoundError("music/1/GLOBAL")

    expect(err).toBeInstanceOf(BaseError)
    expect(err.code).toBe("not_found")
    expect(err.name).toBe("NotFoundError")
    expect(err.message).toBe("No value stored at music/1/GLOBAL")
    expect(err.context).toStrictEqual({ identifier: "music/1/GLOBAL" })
  })

  it("BackendError keeps the raw body and status", () => {
    const err = new BackendError("Request failed", { body: '{"detail":"nope"}', status: 503 })

    expect(err.body).toBe('{"detail":"nope"}')
    expect(err.status).toBe(503)
    expect(err.context).toStrictEqual({ body: '{"detail":"nope"}', status: 503 })
  })

  it("TypeMismatchError describes the stored type", () => {
    const err = new TypeMismatchError("a/b", "number", ["x"])

    expect(err.message).toBe("Expected number at a/b, found array")
    expect(err.context).toStrictEqual({ identifier: "a/b", expected: "number", actual: "array" })
  })

  it("ConfirmationRequiredError names the operation", () => {
    const err = new ConfirmationRequiredError("deleteAllData")

    expect(err.code).toBe("confirmation_required")
    expect(err.message).toBe("deleteAllData is irreversible and requires { confirm: true }")
  })

  it("isAppError recognises BaseError subclasses only", () => {
    expect(isAppError(new NotFoundError("x"))).toBe(true)
    expect(isAppError(new Error("plain"))).toBe(false)
    expect(isAppError({ code: "x" })).toBe(false)
  })

  it("serializeError nests causes", () => {
    const cause = new Error("socket hang up")
    const err = new BackendError("Transport failure", { cause })

    const out = serializeError(err)

    expect(out.code).toBe("backend_error")
    expect(out.cause).toMatchObject({ name: "Error", code: "unknown", message: "socket hang up" })
    expect(out).not.toHaveProperty("stack")
  })

  it("serializeError wraps thrown strings", () => {
    expect(serializeError("boom")).toMatchObject({
      name: "NonErrorThrown",
      code: "unknown",
      message: "boom",
    })
  })
})
