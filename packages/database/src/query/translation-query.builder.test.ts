import { describe, it, expect } from 'vitest'
import { buildExportWhere, buildTranslationOrder, buildTranslationQuery, buildTranslationWhere } from './translation-query.builder'
import { compileExportQuery, compileTranslationQuery, escapeLikePattern } from './translation-query.sql'

const COLUMNS = 't.id, t.key, t.value, t.locale, t.created_at, t.updated_at'
const TAG_EXISTS =
  'EXISTS (SELECT 1 FROM tag_translation tt INNER JOIN tags g ON g.id = tt.tag_id WHERE tt.translation_id = t.id AND g.name = ANY($3))'

describe('buildTranslationWhere', () => {
  it('returns an empty predicate when nothing is set', () => {
    expect(buildTranslationWhere()).toEqual({})
    expect(buildTranslationWhere({ key: '', value: '', locale: '', tags: [] })).toEqual({})
  })

  it('combines every present filter', () => {
    expect(buildTranslationWhere({ key: 'welcome', value: 'hello', locale: 'en', tags: ['web', 'mobile', 'web'] })).toEqual({
      key: { contains: 'welcome', mode: 'insensitive' },
      value: { contains: 'hello', mode: 'insensitive' },
      locale: { equals: 'en' },
      tags: { some: { name: { in: ['mobile', 'web'] } } },
    })
  })

  it('restricts exports to the locale and tags', () => {
    expect(buildExportWhere('fr')).toEqual({ locale: { equals: 'fr' } })
    expect(buildExportWhere('fr', ['web'])).toEqual({
      locale: { equals: 'fr' },
      tags: { some: { name: { in: ['web'] } } },
    })
  })
})

describe('buildTranslationOrder', () => {
  it('orders by id when no sort is given', () => {
    expect(buildTranslationOrder()).toEqual([{ field: 'id', direction: 'asc' }])
  })

  it('appends id as the tie breaker', () => {
    expect(buildTranslationOrder({ field: 'key', direction: 'desc' })).toEqual([
      { field: 'key', direction: 'desc' },
      { field: 'id', direction: 'asc' },
    ])
  })

  it('does not repeat id', () => {
    expect(buildTranslationOrder({ field: 'id', direction: 'desc' })).toEqual([{ field: 'id', direction: 'desc' }])
  })
})

describe('buildTranslationQuery', () => {
  it('uses default pagination', () => {
    const query = buildTranslationQuery()
    expect(query.page).toBe(1)
    expect(query.limit).toBe(15)
    expect(query.skip).toBe(0)
  })

  it('clamps the page size and computes the offset', () => {
    expect(buildTranslationQuery({}, { page: 3, limit: 500 })).toMatchObject({ page: 3, limit: 100, skip: 200 })
    expect(buildTranslationQuery({}, { page: '2', limit: '0' })).toMatchObject({ page: 2, limit: 1, skip: 1 })
    expect(buildTranslationQuery({}, { page: -4, limit: 'many' })).toMatchObject({ page: 1, limit: 15, skip: 0 })
  })
})

describe('compileTranslationQuery', () => {
  it('compiles an unfiltered listing', () => {
    const { select, count } = compileTranslationQuery(buildTranslationQuery())

    expect(select.text).toBe(`SELECT ${COLUMNS} FROM translations t ORDER BY t.id ASC LIMIT $1 OFFSET $2`)
    expect(select.values).toEqual([15, 0])
    expect(count.text).toBe('SELECT COUNT(*)::int AS total FROM translations t')
    expect(count.values).toEqual([])
  })

  it('compiles filters, sort and pagination into parameters', () => {
    const query = buildTranslationQuery(
      { key: 'wel', locale: 'en', tags: ['web', 'mobile'] },
      { page: 2, limit: 10, sort: { field: 'key', direction: 'desc' } }
    )
    const { select, count } = compileTranslationQuery(query)
    const where = `WHERE t.key ILIKE $1 AND t.locale = $2 AND ${TAG_EXISTS}`

    expect(select.text).toBe(
      `SELECT ${COLUMNS} FROM translations t ${where} ORDER BY t.key COLLATE "C" DESC, t.id ASC LIMIT $4 OFFSET $5`
    )
    expect(select.values).toEqual(['%wel%', 'en', ['mobile', 'web'], 10, 10])
    expect(count.text).toBe(`SELECT COUNT(*)::int AS total FROM translations t ${where}`)
    expect(count.values).toEqual(['%wel%', 'en', ['mobile', 'web']])
  })

  it('matches wildcard characters literally', () => {
    const { select } = compileTranslationQuery(buildTranslationQuery({ value: '50%_off' }))
    expect(select.values[0]).toBe('%50\\%\\_off%')
  })
})

describe('compileExportQuery', () => {
  it('selects key and value for the locale', () => {
    expect(compileExportQuery(buildExportWhere('fr', []))).toEqual({
      text: 'SELECT t.key, t.value FROM translations t WHERE t.locale = $1 ORDER BY t.key ASC',
      values: ['fr'],
    })
  })
})

describe('escapeLikePattern', () => {
  it('escapes backslashes and wildcards', () => {
    expect(escapeLikePattern('a\\b%c_d')).toBe('a\\\\b\\%c\\_d')
  })
})
