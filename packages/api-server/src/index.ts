export { type ConfigApiOptions, createConfigApi } from "./create-config-api"
export { createErrorHandler } from "./errors/create-error-handler"
export {
  configErrorMappings,
  createErrorFormatter,
  type ErrorFormatter,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type ErrorResponseBody,
  type FallbackMapping,
} from "./errors/errors"
export { UnauthorizedError } from "./errors/unauthorized-error"
export { parseOrThrow, ValidationError, type ValidationIssue } from "./errors/validation"
export { identifierFromPath } from "./routes/request-schemas"
export {
  type Closeable,
  type ConfigApiServerOptions,
  startConfigApiServer,
} from "./start-config-api-server"
export type { ApiEnv, ConfigApi } from "./types"
