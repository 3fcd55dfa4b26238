import { BaseError } from "@layerconf/errors"

export class UnauthorizedError extends BaseError<"unauthorized"> {
  constructor() {
    super("Invalid or missing bearer token", { code: "unauthorized" })
  }
}
