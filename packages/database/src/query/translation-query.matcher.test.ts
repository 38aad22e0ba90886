import { describe, it, expect } from 'vitest'
import type { Translation } from '@catalog/shared'
import { compareTranslations, matchesTranslationWhere } from './translation-query.matcher'
import { buildTranslationOrder, buildTranslationWhere } from './translation-query.builder'

function translation(id: number, key: string, locale: string, value = `value ${id}`): Translation {
  const createdAt = new Date(Date.UTC(2026, 0, id))
  return { id, key, value, locale, createdAt, updatedAt: createdAt }
}

describe('matchesTranslationWhere', () => {
  const welcome = translation(1, 'Welcome.Title', 'en', 'Hello there')

  it('matches key and value case-insensitively', () => {
    expect(matchesTranslationWhere(welcome, [], buildTranslationWhere({ key: 'welcome' }))).toBe(true)
    expect(matchesTranslationWhere(welcome, [], buildTranslationWhere({ value: 'THERE' }))).toBe(true)
    expect(matchesTranslationWhere(welcome, [], buildTranslationWhere({ value: 'bye' }))).toBe(false)
  })

  it('matches the locale exactly', () => {
    expect(matchesTranslationWhere(welcome, [], buildTranslationWhere({ locale: 'en' }))).toBe(true)
    expect(matchesTranslationWhere(welcome, [], buildTranslationWhere({ locale: 'EN' }))).toBe(false)
  })

  it('requires at least one of the tags', () => {
    const where = buildTranslationWhere({ tags: ['web', 'mobile'] })
    expect(matchesTranslationWhere(welcome, ['mobile', 'admin'], where)).toBe(true)
    expect(matchesTranslationWhere(welcome, ['admin'], where)).toBe(false)
    expect(matchesTranslationWhere(welcome, [], where)).toBe(false)
  })
})

describe('compareTranslations', () => {
  it('sorts by code unit and breaks ties by id', () => {
    const rows = [translation(3, 'b', 'fr'), translation(1, 'B', 'en'), translation(2, 'b', 'de')]
    const sorted = [...rows].sort(compareTranslations(buildTranslationOrder({ field: 'key', direction: 'asc' })))
    expect(sorted.map((row) => row.id)).toEqual([1, 2, 3])
  })

  it('sorts dates descending', () => {
    const rows = [translation(1, 'a', 'en'), translation(3, 'c', 'en'), translation(2, 'b', 'en')]
    const sorted = [...rows].sort(compareTranslations(buildTranslationOrder({ field: 'createdAt', direction: 'desc' })))
    expect(sorted.map((row) => row.id)).toEqual([3, 2, 1])
  })
})
