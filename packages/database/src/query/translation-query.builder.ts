// =============================================================================
// TRANSLATION QUERY BUILDER
// =============================================================================
// Composes a translation filter into an executable, deterministically ordered
// and paginated query.

import {
  clampPageSize,
  normalizePage,
  normalizeTagNames,
  type TranslationFilter,
  type TranslationSort,
} from '@catalog/shared'
import type { TranslationQuery, TranslationWhere } from '../types'

export interface TranslationQueryOptions {
  page?: unknown
  limit?: unknown
  sort?: TranslationSort
}

/**
 * Every present predicate is AND-ed; the tag predicate is an OR across names.
 * Empty strings and empty tag lists count as absent, so `{}` matches everything.
 */
export function buildTranslationWhere(filter: TranslationFilter = {}): TranslationWhere {
  const where: TranslationWhere = {}

  if (filter.key) {
    where.key = { contains: filter.key, mode: 'insensitive' }
  }

  if (filter.value) {
    where.value = { contains: filter.value, mode: 'insensitive' }
  }

  if (filter.locale) {
    where.locale = { equals: filter.locale }
  }

  const tags = normalizeTagNames(filter.tags)
  if (tags.length > 0) {
    where.tags = { some: { name: { in: tags } } }
  }

  return where
}

/**
 * Identity is always the last sort column so that pages never overlap or skip
 * rows, even when the primary order has ties or is absent.
 */
export function buildTranslationOrder(sort?: TranslationSort): TranslationSort[] {
  if (!sort) {
    return [{ field: 'id', direction: 'asc' }]
  }

  if (sort.field === 'id') {
    return [sort]
  }

  return [sort, { field: 'id', direction: 'asc' }]
}

export function buildTranslationQuery(
  filter: TranslationFilter = {},
  options: TranslationQueryOptions = {}
): TranslationQuery {
  const page = normalizePage(options.page)
  const limit = clampPageSize(options.limit)

  return {
    where: buildTranslationWhere(filter),
    orderBy: buildTranslationOrder(options.sort),
    page,
    limit,
    skip: (page - 1) * limit,
  }
}

/**
 * Predicate for a locale export, optionally restricted to an OR-set of tags
 */
export function buildExportWhere(locale: string, tagNames?: readonly string[]): TranslationWhere {
  return buildTranslationWhere({ locale, tags: tagNames ? [...tagNames] : undefined })
}
