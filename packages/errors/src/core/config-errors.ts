import type { ErrorContext } from "../ports/error"
import { BaseError } from "./base-error"

/**
 * No value is stored at the requested identifier.
 *
 * Callers that know a default recover from this locally.
 */
export class NotFoundError extends BaseError<"not_found"> {
  constructor(identifier: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(`No value stored at ${identifier}`, {
      code: "not_found",
      context: { identifier, ...options.context },
      ...(options.cause !== undefined && { cause: options.cause }),
    })
  }
}

export type BackendErrorOptions = {
  /** Raw response body or other backend diagnostic text. */
  body?: string
  status?: number
  identifier?: string
  cause?: unknown
}

/**
 * A backend rejected or failed an operation (non-200 response, malformed body,
 * transport failure, query error).
 */
export class BackendError extends BaseError<"backend_error"> {
  readonly body: string | undefined
  readonly status: number | undefined

  constructor(message: string, options: BackendErrorOptions = {}) {
    super(message, {
      code: "backend_error",
      context: {
        ...(options.body !== undefined && { body: options.body }),
        ...(options.status !== undefined && { status: options.status }),
        ...(options.identifier !== undefined && { identifier: options.identifier }),
      },
      ...(options.cause !== undefined && { cause: options.cause }),
    })

    this.body = options.body
    this.status = options.status
  }
}

/**
 * `increment` or `toggle` hit a stored value of the wrong shape.
 */
export class TypeMismatchError extends BaseError<"type_mismatch"> {
  constructor(identifier: string, expected: string, actual: unknown) {
    const actualType = describeType(actual)

    super(`Expected ${expected} at ${identifier}, found ${actualType}`, {
      code: "type_mismatch",
      context: { identifier, expected, actual: actualType },
    })
  }
}

/**
 * A destructive bulk operation was invoked without `confirm: true`.
 */
export class ConfirmationRequiredError extends BaseError<"confirmation_required"> {
  constructor(operation: string) {
    super(`${operation} is irreversible and requires { confirm: true }`, {
      code: "confirmation_required",
      context: { operation },
    })
  }
}

export class InvalidIdentifierError extends BaseError<"invalid_identifier"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "invalid_identifier", context, isOperational: false })
  }
}

/**
 * An operation was issued before `initialize()` resolved or after `teardown()` began.
 */
export class BackendNotReadyError extends BaseError<"backend_not_ready"> {
  constructor(backend: string, state: string) {
    super(`Backend "${backend}" is ${state}`, {
      code: "backend_not_ready",
      context: { backend, state },
      isOperational: false,
    })
  }
}

export function describeType(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"

  return typeof value
}
