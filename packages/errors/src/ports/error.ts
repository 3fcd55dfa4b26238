export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (identifiers, response bodies, ...).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /**
   * `true` for expected runtime failures (missing key, rejected request),
   * `false` for invariant violations.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/**
 * JSON-safe error shape used in logs and API error bodies.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
