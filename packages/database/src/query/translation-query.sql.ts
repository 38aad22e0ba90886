// =============================================================================
// TRANSLATION QUERY - POSTGRESQL COMPILER
// =============================================================================

import type { TranslationSortField } from '@catalog/shared'
import type { TranslationQuery, TranslationWhere } from '../types'

export interface CompiledQuery {
  text: string
  values: unknown[]
}

export const TRANSLATION_COLUMNS = 't.id, t.key, t.value, t.locale, t.created_at, t.updated_at'

const SORT_COLUMNS: Record<TranslationSortField, string> = {
  id: 't.id',
  key: 't.key COLLATE "C"',
  locale: 't.locale COLLATE "C"',
  createdAt: 't.created_at',
  updatedAt: 't.updated_at',
}

/**
 * Escape LIKE wildcards so user input only ever matches literally.
 * Postgres uses backslash as the default LIKE escape character.
 */
export function escapeLikePattern(input: string): string {
  return input.replace(/[\\%_]/g, (char) => `\\${char}`)
}

/**
 * Append the predicate's parameters to `values` and return the WHERE clause,
 * or an empty string when the predicate is empty.
 */
export function compileTranslationWhere(where: TranslationWhere, values: unknown[]): string {
  const conditions: string[] = []
  const param = (value: unknown): string => {
    values.push(value)
    return `$${values.length}`
  }

  if (where.key) {
    conditions.push(`t.key ILIKE ${param(`%${escapeLikePattern(where.key.contains)}%`)}`)
  }

  if (where.value) {
    conditions.push(`t.value ILIKE ${param(`%${escapeLikePattern(where.value.contains)}%`)}`)
  }

  if (where.locale) {
    conditions.push(`t.locale = ${param(where.locale.equals)}`)
  }

  if (where.tags) {
    conditions.push(
      'EXISTS (SELECT 1 FROM tag_translation tt INNER JOIN tags g ON g.id = tt.tag_id ' +
        `WHERE tt.translation_id = t.id AND g.name = ANY(${param(where.tags.some.name.in)}))`
    )
  }

  return conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''
}

function joinClauses(...clauses: string[]): string {
  return clauses.filter((clause) => clause.length > 0).join(' ')
}

export function compileTranslationQuery(query: TranslationQuery): { select: CompiledQuery; count: CompiledQuery } {
  const countValues: unknown[] = []
  const countWhere = compileTranslationWhere(query.where, countValues)

  const selectValues: unknown[] = []
  const selectWhere = compileTranslationWhere(query.where, selectValues)
  const orderBy = query.orderBy
    .map((sort) => `${SORT_COLUMNS[sort.field]} ${sort.direction === 'desc' ? 'DESC' : 'ASC'}`)
    .join(', ')

  selectValues.push(query.limit, query.skip)
  const limitParam = `$${selectValues.length - 1}`
  const offsetParam = `$${selectValues.length}`

  return {
    select: {
      text: joinClauses(
        `SELECT ${TRANSLATION_COLUMNS} FROM translations t`,
        selectWhere,
        orderBy ? `ORDER BY ${orderBy}` : '',
        `LIMIT ${limitParam} OFFSET ${offsetParam}`
      ),
      values: selectValues,
    },
    count: {
      text: joinClauses('SELECT COUNT(*)::int AS total FROM translations t', countWhere),
      values: countValues,
    },
  }
}

export function compileExportQuery(where: TranslationWhere): CompiledQuery {
  const values: unknown[] = []
  const whereClause = compileTranslationWhere(where, values)

  return {
    text: joinClauses('SELECT t.key, t.value FROM translations t', whereClause, 'ORDER BY t.key ASC'),
    values,
  }
}
