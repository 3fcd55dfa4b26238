import { type AppError, type ErrorCode, isAppError } from "@layerconf/errors"
import type { ContentfulStatusCode } from "hono/utils/http-status"

export type ErrorMapping = {
  status: ContentfulStatusCode

  /** Replaces the error's own message in the response. */
  message?: string
}

export type FallbackMapping = Required<ErrorMapping> & {
  code: ErrorCode
}

export interface ErrorMappingsConfig {
  /**
   * Map of error code to status/message.
   * Unmapped AppErrors use the fallback status but keep their code.
   */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  fallback?: FallbackMapping
}

export type ErrorResponseBody = {
  status: ContentfulStatusCode
  code: ErrorCode
  message: string
  requestId: string
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

/**
 * Status and message for every error the config routes raise. Operational
 * errors keep their message, since API clients surface it as diagnostics.
 */
export const configErrorMappings: ErrorMappingsConfig = {
  mappings: {
    not_found: { status: 404 },
    type_mismatch: { status: 400 },
    confirmation_required: { status: 400 },
    invalid_identifier: { status: 400 },
    validation_error: { status: 400 },
    unauthorized: { status: 401, message: "Invalid or missing credentials" },
    backend_not_ready: { status: 503, message: "Storage backend is not ready" },
  },
}

export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error: unknown, requestId: string): ErrorResponse => {
    if (isAppError(error)) {
      const mapping = config.mappings[error.code]

      return {
        error: {
          code: error.code,
          status: mapping?.status ?? fallback.status,
          message: mapping?.message ?? messageOf(error, mapping, fallback),
          requestId,
        },
      }
    }

    return {
      error: {
        code: fallback.code,
        status: fallback.status,
        message: fallback.message,
        requestId,
      },
    }
  }
}

function messageOf(
  error: AppError,
  mapping: ErrorMapping | undefined,
  fallback: FallbackMapping,
): string {
  return mapping !== undefined && error.isOperational ? error.message : fallback.message
}
