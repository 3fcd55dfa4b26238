export {
  BaseError,
  type BaseErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export {
  BackendError,
  type BackendErrorOptions,
  BackendNotReadyError,
  ConfirmationRequiredError,
  describeType,
  InvalidIdentifierError,
  NotFoundError,
  TypeMismatchError,
} from "./core/config-errors"
export { isAppError } from "./core/utils/is-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
