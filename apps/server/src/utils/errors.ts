// =============================================================================
// ERROR HANDLING UTILITIES
// =============================================================================

import type { Request, Response } from 'express'
import { ZodError } from 'zod'
import {
  ConflictError as DbConflictError,
  DatabaseError as DbError,
  NotFoundError as DbNotFoundError,
  StoreUnavailableError as DbStoreUnavailableError,
  ValidationError as DbValidationError,
} from '@catalog/database'
import { Logger } from './logger'

// =============================================================================
// CUSTOM ERROR CLASSES
// =============================================================================

export class AppError extends Error {
  public readonly statusCode: number
  public readonly isOperational: boolean
  public readonly code?: string
  public readonly details?: unknown

  constructor(
    message: string,
    statusCode: number = 500,
    code?: string,
    details?: unknown,
    isOperational: boolean = true
  ) {
    super(message)

    this.name = new.target.name
    this.statusCode = statusCode
    this.isOperational = isOperational
    this.code = code
    this.details = details

    Error.captureStackTrace(this, this.constructor)
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 422, 'VALIDATION_ERROR', details)
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, 'NOT_FOUND')
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 409, 'CONFLICT', details)
  }
}

export class RateLimitError extends AppError {
  constructor(message: string = 'Too many requests') {
    super(message, 429, 'RATE_LIMIT_EXCEEDED')
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'DATABASE_ERROR', details)
  }
}

/**
 * A backing store (database or cache) could not be reached. Clients may retry.
 */
export class StoreUnavailableError extends AppError {
  constructor(message: string = 'Service temporarily unavailable') {
    super(message, 503, 'STORE_UNAVAILABLE', { retryable: true })
  }
}

// =============================================================================
// ERROR RESPONSE INTERFACE
// =============================================================================

export interface ErrorResponse {
  success: false
  error: {
    message: string
    code?: string
    statusCode: number
    details?: unknown
    stack?: string
    timestamp: string
    path?: string
    method?: string
  }
}

// =============================================================================
// ERROR HANDLING FUNCTIONS
// =============================================================================

export function handleZodError(error: ZodError): ValidationError {
  const details = error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code
  }))

  return new ValidationError('Validation failed', details)
}

export function handleDatabaseError(error: DbError): AppError {
  if (error instanceof DbStoreUnavailableError) {
    return new StoreUnavailableError()
  }

  if (error instanceof DbNotFoundError) {
    return new NotFoundError(error.message.replace(/ not found.*$/, ''))
  }

  if (error instanceof DbConflictError) {
    return new ConflictError('A record with this data already exists', {
      constraint: error.constraint
    })
  }

  if (error instanceof DbValidationError) {
    return new ValidationError(error.message, error.field ? { field: error.field } : undefined)
  }

  return new DatabaseError('Database operation failed', error.code ? { code: error.code } : undefined)
}

export function createErrorResponse(
  error: AppError | Error,
  req?: Request,
  includeStack: boolean = false
): ErrorResponse {
  const isAppError = error instanceof AppError

  const response: ErrorResponse = {
    success: false,
    error: {
      message: error.message,
      code: isAppError ? error.code : 'INTERNAL_ERROR',
      statusCode: isAppError ? error.statusCode : 500,
      timestamp: new Date().toISOString(),
      path: req?.path,
      method: req?.method
    }
  }

  if (isAppError && error.details !== undefined) {
    response.error.details = error.details
  }

  if (includeStack && error.stack) {
    response.error.stack = error.stack
  }

  return response
}

export function sendErrorResponse(
  res: Response,
  error: AppError | Error,
  req?: Request,
  responseTime?: number
): void {
  const isAppError = error instanceof AppError
  const statusCode = isAppError ? error.statusCode : 500
  const includeStack = process.env.NODE_ENV === 'development'

  if (statusCode >= 500) {
    Logger.logError(error, 'Server Error')
  } else if (statusCode >= 400) {
    Logger.warn(`Client Error: ${error.message}`, {
      statusCode,
      path: req?.path,
      method: req?.method,
      ip: req?.ip,
      responseTime: responseTime !== undefined ? `${responseTime}ms` : undefined
    })
  }

  const errorResponse = createErrorResponse(error, req, includeStack)
  res.status(statusCode).json(errorResponse)
}

// =============================================================================
// ERROR PROCESSING UTILITIES
// =============================================================================

export function processError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error
  }

  if (error instanceof ZodError) {
    return handleZodError(error)
  }

  if (error instanceof DbError) {
    return handleDatabaseError(error)
  }

  // Malformed JSON bodies surface from express.json() as SyntaxError with a status
  if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    return new AppError('Malformed JSON body', 400, 'BAD_REQUEST')
  }

  const message = error instanceof Error ? error.message : String(error)

  return new AppError(
    process.env.NODE_ENV === 'production'
      ? 'Internal server error'
      : message || 'Unknown error occurred',
    500,
    'INTERNAL_ERROR',
    process.env.NODE_ENV === 'development' ? { originalError: message } : undefined,
    false
  )
}

// =============================================================================
// EXPORTS
// =============================================================================

export default AppError
