import { BaseError, type ErrorContext } from "@layerconf/errors"
import { z } from "zod"

export type ValidationIssue = { path: string; message: string }

export class ValidationError extends BaseError<"validation_error"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "validation_error", context })
  }

  static fromZodError(err: z.ZodError): ValidationError {
    const issues: ValidationIssue[] = err.issues.map((i) => ({
      path: i.path.map(String).join("."),
      message: i.message,
    }))

    return new ValidationError(issues[0]?.message ?? "Invalid input", { issues })
  }
}

export function parseOrThrow<T>(schema: z.ZodType<T>, data: unknown): T {
  const result = schema.safeParse(data)

  if (!result.success) {
    throw ValidationError.fromZodError(result.error)
  }

  return result.data
}
