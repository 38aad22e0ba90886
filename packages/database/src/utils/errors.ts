// =============================================================================
// DATABASE ERROR UTILITIES
// =============================================================================
// Centralized error handling for database operations

import { hasErrorCode } from './type-guards'

export class DatabaseError extends Error {
  constructor(
    message: string,
    public code?: string,
    public originalError?: unknown
  ) {
    super(message)
    this.name = 'DatabaseError'
  }
}

export class NotFoundError extends DatabaseError {
  constructor(resource: string, identifier?: string | number) {
    super(
      identifier !== undefined
        ? `${resource} not found with identifier: ${identifier}`
        : `${resource} not found`
    )
    this.name = 'NotFoundError'
  }
}

export class ConflictError extends DatabaseError {
  constructor(message: string, public constraint?: string) {
    super(message)
    this.name = 'ConflictError'
  }
}

export class ValidationError extends DatabaseError {
  constructor(message: string, public field?: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * The store could not be reached or refused the work. Safe to retry.
 */
export class StoreUnavailableError extends DatabaseError {
  public readonly retryable = true

  constructor(message: string, code?: string, originalError?: unknown) {
    super(message, code, originalError)
    this.name = 'StoreUnavailableError'
  }
}

// =============================================================================
// POSTGRES ERROR MAPPING
// =============================================================================

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
  '53300', // too_many_connections
  '40001', // serialization_failure
  '40P01', // deadlock_detected
])

const VALIDATION_ERROR_CODES: Record<string, string> = {
  '23502': 'Required column is missing',
  '23503': 'Foreign key constraint violation',
  '22001': 'Value too long for column',
  '22003': 'Numeric value out of range',
  '22P02': 'Invalid input syntax',
}

const SQLSTATE_PATTERN = /^[0-9A-Z]{5}$/

function isConnectionFailure(error: unknown): boolean {
  if (hasErrorCode(error)) {
    // Class 08 covers every connection exception
    return CONNECTION_ERROR_CODES.has(error.code) || error.code.startsWith('08')
  }
  return error instanceof Error && /connection terminated|timeout exceeded when trying to connect/i.test(error.message)
}

/**
 * Errors raised by pg or the socket beneath it, as opposed to errors thrown by
 * calling code
 */
export function isDriverError(error: unknown): boolean {
  if (error instanceof DatabaseError || isConnectionFailure(error)) {
    return true
  }
  return hasErrorCode(error) && SQLSTATE_PATTERN.test(error.code)
}

/**
 * Convert a driver error into the database error taxonomy. Errors that already
 * belong to it are returned unchanged.
 */
export function toDatabaseError(error: unknown, operation: string, resource = 'Record'): DatabaseError {
  if (error instanceof DatabaseError) {
    return error
  }

  if (isConnectionFailure(error)) {
    const code = hasErrorCode(error) ? error.code : undefined
    return new StoreUnavailableError(`Database unavailable during ${operation}`, code, error)
  }

  if (hasErrorCode(error)) {
    if (error.code === '23505') {
      const constraint = typeof error.constraint === 'string' ? error.constraint : undefined
      return new ConflictError(
        `Unique constraint violation on ${resource}${constraint ? ` (${constraint})` : ''}`,
        constraint
      )
    }

    const validationMessage = VALIDATION_ERROR_CODES[error.code]
    if (validationMessage) {
      return new ValidationError(`${validationMessage} during ${operation}`)
    }

    return new DatabaseError(`Database error during ${operation}: ${error.message}`, error.code, error)
  }

  const message = error instanceof Error ? error.message : String(error)
  return new DatabaseError(`Unexpected error during ${operation}: ${message}`, undefined, error)
}
