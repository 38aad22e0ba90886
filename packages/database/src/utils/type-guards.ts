// =============================================================================
// TYPE GUARD UTILITIES
// =============================================================================
// Safe type conversion utilities for database rows

/**
 * Ensures a value is a string, converting if necessary
 */
export function ensureString(value: unknown): string {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return value.toString()
  if (typeof value === 'boolean') return value.toString()
  if (value === null || value === undefined) return ''
  return String(value)
}

/**
 * Ensures a value is a finite number. BIGINT and NUMERIC columns arrive as strings.
 */
export function ensureNumber(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    if (Number.isFinite(parsed)) return parsed
  }
  throw new Error(`Expected a numeric value, received: ${String(value)}`)
}

/**
 * Ensures a value is a valid Date
 */
export function ensureDate(value: unknown): Date {
  if (value instanceof Date && !Number.isNaN(value.getTime())) return value
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value)
    if (!Number.isNaN(date.getTime())) return date
  }
  throw new Error(`Expected a date value, received: ${String(value)}`)
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Driver and system errors carry a string `code` (SQLSTATE or errno name)
 */
export function hasErrorCode(error: unknown): error is Error & { code: string; constraint?: unknown } {
  return error instanceof Error && isRecord(error) && typeof error.code === 'string'
}
