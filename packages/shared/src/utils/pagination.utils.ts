import { PAGINATION } from '../constants'

function toInteger(raw: unknown): number | undefined {
  if (raw === undefined || raw === null || raw === '') {
    return undefined
  }

  const parsed = typeof raw === 'number' ? raw : Number(raw)
  return Number.isFinite(parsed) ? Math.trunc(parsed) : undefined
}

/**
 * Page size clamped to [MIN_LIMIT, MAX_LIMIT]. Missing or non-numeric input
 * falls back to the default; out-of-range input is clamped, never rejected.
 */
export function clampPageSize(raw: unknown): number {
  const limit = toInteger(raw)
  if (limit === undefined) {
    return PAGINATION.DEFAULT_LIMIT
  }
  return Math.min(PAGINATION.MAX_LIMIT, Math.max(PAGINATION.MIN_LIMIT, limit))
}

export function normalizePage(raw: unknown): number {
  const page = toInteger(raw)
  if (page === undefined) {
    return PAGINATION.DEFAULT_PAGE
  }
  return Math.max(PAGINATION.DEFAULT_PAGE, page)
}

export function calculatePagination(page: number, limit: number, total: number) {
  const totalPages = Math.ceil(total / limit)

  return {
    page,
    limit,
    total,
    totalPages,
    hasNext: page < totalPages,
    hasPrev: page > 1
  }
}
