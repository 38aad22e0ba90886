import type { z } from "zod"
import { ValidationError } from "../utils/errors"
import { Logger } from "../utils/logger"

export type RequestLocation = "body" | "query" | "params"

export interface ValidationIssue {
  field: string
  message: string
  code: string
  location: RequestLocation
}

/**
 * Parse one part of a request against a zod schema. Failures become a 422
 * ValidationError listing every issue.
 */
export function parseRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  location: RequestLocation
): T {
  const result = schema.safeParse(data)
  if (result.success) {
    return result.data
  }

  const errors: ValidationIssue[] = result.error.errors.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
    code: issue.code,
    location,
  }))

  Logger.warn("Request validation failed", { location, errors })
  throw new ValidationError("Validation failed", errors)
}
