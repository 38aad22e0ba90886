import { describe, it, expect } from 'vitest'
import {
  deriveExportCacheKey,
  exportCacheKeyPrefix,
  isExportCacheKeyForLocale,
  normalizeTagNames,
} from './cache-key.utils'

describe('deriveExportCacheKey', () => {
  it('returns the base locale key when no tags are given', () => {
    expect(deriveExportCacheKey('en')).toBe('translations:export:en')
    expect(deriveExportCacheKey('en', [])).toBe('translations:export:en')
    expect(deriveExportCacheKey('en', null)).toBe('translations:export:en')
  })

  it('appends the sorted tag list', () => {
    expect(deriveExportCacheKey('en', ['web', 'mobile'])).toBe('translations:export:en:tags:mobile,web')
  })

  it('ignores the order of the tag list', () => {
    const orderings = [
      ['web', 'mobile', 'admin'],
      ['admin', 'web', 'mobile'],
      ['mobile', 'admin', 'web'],
    ]
    const keys = new Set(orderings.map((tags) => deriveExportCacheKey('fr', tags)))
    expect(keys.size).toBe(1)
  })

  it('ignores duplicate tag names', () => {
    expect(deriveExportCacheKey('en', ['web', 'web', 'mobile'])).toBe(deriveExportCacheKey('en', ['mobile', 'web']))
  })

  it('treats tag names case-sensitively', () => {
    expect(deriveExportCacheKey('en', ['Web'])).not.toBe(deriveExportCacheKey('en', ['web']))
  })

  it('does not collide when a tag name contains the separator', () => {
    expect(deriveExportCacheKey('en', ['a,b'])).toBe('translations:export:en:tags:a%2Cb')
    expect(deriveExportCacheKey('en', ['a', 'b'])).toBe('translations:export:en:tags:a,b')
  })
})

describe('isExportCacheKeyForLocale', () => {
  it('matches the base key and tagged keys of the same locale', () => {
    expect(isExportCacheKeyForLocale(exportCacheKeyPrefix('en'), 'en')).toBe(true)
    expect(isExportCacheKeyForLocale(deriveExportCacheKey('en', ['web']), 'en')).toBe(true)
  })

  it('does not match a locale that merely shares a prefix', () => {
    expect(isExportCacheKeyForLocale(deriveExportCacheKey('en-GB', ['web']), 'en')).toBe(false)
    expect(isExportCacheKeyForLocale(exportCacheKeyPrefix('en_US'), 'en')).toBe(false)
  })
})

describe('normalizeTagNames', () => {
  it('drops empty names and sorts by code unit', () => {
    expect(normalizeTagNames(['b', '', 'B', 'a'])).toEqual(['B', 'a', 'b'])
  })
})
