import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { MemoryDatabase } from '@catalog/database/testing'
import type { CacheStore } from '../types/cache.types'
import { MemoryCacheStore } from './cache.service'
import { ExportCacheManager } from './export-cache.service'

async function addTranslation(db: MemoryDatabase, key: string, value: string, locale: string, tags: string[] = []) {
  await db.transaction(async (repositories) => {
    const translation = await repositories.translation.create({ key, value, locale })
    const created = await repositories.tag.findOrCreateMany(tags)
    await repositories.translation.syncTags(translation.id, created.map((tag) => tag.id))
  })
}

function withoutListKeys(inner: MemoryCacheStore): CacheStore {
  return {
    name: 'plain',
    get: (key) => inner.get(key),
    set: (key, value, ttl) => inner.set(key, value, ttl),
    delete: (key) => inner.delete(key),
    ping: () => inner.ping(),
    close: () => inner.close(),
  }
}

describe('ExportCacheManager', () => {
  let db: MemoryDatabase
  let store: MemoryCacheStore
  let manager: ExportCacheManager

  beforeEach(async () => {
    db = new MemoryDatabase()
    store = new MemoryCacheStore()
    manager = new ExportCacheManager(db, store, { exportTtl: 300, listsTtl: 3600 })

    await addTranslation(db, 'welcome.msg', 'Welcome', 'en', ['web'])
    await addTranslation(db, 'checkout.pay', 'Pay now', 'en', ['mobile'])
    await addTranslation(db, 'footer.legal', 'Terms', 'en')
    await addTranslation(db, 'welcome.msg', 'Bienvenue', 'fr', ['web'])
  })

  afterEach(async () => {
    await store.close()
  })

  it('builds the export for a locale', async () => {
    const result = await manager.get('en')

    expect(result.locale).toBe('en')
    expect(result.count).toBe(3)
    expect(result.translations).toEqual({
      'checkout.pay': 'Pay now',
      'footer.legal': 'Terms',
      'welcome.msg': 'Welcome',
    })
  })

  it('restricts the export to any of the requested tags', async () => {
    const result = await manager.get('en', ['web', 'mobile'])

    expect(result.translations).toEqual({ 'checkout.pay': 'Pay now', 'welcome.msg': 'Welcome' })
  })

  it('serves repeated requests from the cache', async () => {
    const pluck = vi.spyOn(db.repositories.translation, 'pluckValues')

    const first = await manager.get('en', ['web', 'mobile'])
    const second = await manager.get('en', ['mobile', 'web', 'web'])

    expect(pluck).toHaveBeenCalledTimes(1)
    expect(second).toEqual(first)
  })

  it('removes every export of the locale and the lists under the prefix strategy', async () => {
    await manager.get('en')
    await manager.get('en', ['web'])
    await manager.get('en_US')
    await manager.get('fr')
    await manager.getAvailableLocales()

    const result = await manager.invalidate('en')

    expect(result.strategy).toBe('prefix')
    expect(result.deletedKeys.sort()).toEqual([
      'translations:export:en',
      'translations:export:en:tags:web',
      'translations:locales',
    ])
    expect((await store.listKeys('translations:')).sort()).toEqual([
      'translations:export:en_US',
      'translations:export:fr',
    ])
  })

  it('leaves tag-filtered exports in place under the basic strategy', async () => {
    const basic = new ExportCacheManager(db, store, { strategy: 'basic' })
    await basic.get('en')
    await basic.get('en', ['web'])
    await basic.getAvailableTags()

    const result = await basic.invalidate('en')

    expect(result.strategy).toBe('basic')
    expect(result.deletedKeys.sort()).toEqual(['translations:export:en', 'translations:tags'])
    expect(await store.listKeys('translations:')).toEqual(['translations:export:en:tags:web'])
  })

  it('falls back to basic invalidation when the store cannot list keys', () => {
    const plain = new ExportCacheManager(db, withoutListKeys(store), { strategy: 'prefix' })

    expect(plain.strategy).toBe('basic')
  })

  it('still removes the base and list keys when key listing fails', async () => {
    await manager.get('en')
    await manager.get('en', ['web'])
    await manager.getAvailableLocales()
    vi.spyOn(store, 'listKeys').mockRejectedValue(new Error('scan timeout'))
    const welcome = await db.repositories.translation.findByKeyAndLocale('welcome.msg', 'en')
    await db.repositories.translation.update(welcome?.id ?? 0, { value: 'Hello' })

    const result = await manager.invalidate('en')

    expect(result.strategy).toBe('basic')
    expect(result.deletedKeys.sort()).toEqual(['translations:export:en', 'translations:locales'])
    expect(result.failedKeys).toEqual([])
    expect((await manager.get('en')).translations['welcome.msg']).toBe('Hello')
  })

  it('attempts every delete when one of them fails', async () => {
    await manager.get('en')
    await manager.getAvailableLocales()
    await manager.getAvailableTags()
    const remove = store.delete.bind(store)
    vi.spyOn(store, 'delete').mockImplementation(async (key) => {
      if (key === 'translations:locales') {
        throw new Error('connection reset')
      }
      return remove(key)
    })

    const result = await manager.invalidate('en')

    expect(result.failedKeys).toEqual(['translations:locales'])
    expect(result.deletedKeys.sort()).toEqual(['translations:export:en', 'translations:tags'])
    expect(await store.get('translations:export:en')).toBeNull()
  })

  it('returns a cached export exactly as it was built', async () => {
    await addTranslation(db, '__proto__', 'x', 'de')

    const miss = await manager.get('de')
    const hit = await manager.get('de')

    expect(Object.entries(miss.translations)).toEqual([['__proto__', 'x']])
    expect(Object.entries(hit.translations)).toEqual([['__proto__', 'x']])
    expect(hit.count).toBe(1)
  })

  it('shows committed changes after invalidation', async () => {
    await manager.get('en')
    const welcome = await db.repositories.translation.findByKeyAndLocale('welcome.msg', 'en')
    await db.repositories.translation.update(welcome?.id ?? 0, { value: 'Hello' })

    expect((await manager.get('en')).translations['welcome.msg']).toBe('Welcome')

    await manager.invalidate('en')

    expect((await manager.get('en')).translations['welcome.msg']).toBe('Hello')
  })

  it('falls through to the database when the cache cannot be read', async () => {
    vi.spyOn(store, 'get').mockRejectedValue(new Error('cache down'))

    const result = await manager.get('fr')

    expect(result.translations).toEqual({ 'welcome.msg': 'Bienvenue' })
  })

  it('returns the export when the cache cannot be written', async () => {
    vi.spyOn(store, 'set').mockRejectedValue(new Error('cache down'))

    await expect(manager.get('fr')).resolves.toMatchObject({ count: 1 })
  })

  it('ignores malformed cache entries', async () => {
    await store.set('translations:export:fr', { unexpected: true }, 60)

    const result = await manager.get('fr')

    expect(result.count).toBe(1)
  })

  it('does not store an export computed before a concurrent invalidation', async () => {
    const translations = db.repositories.translation
    const pluck = translations.pluckValues.bind(translations)
    vi.spyOn(translations, 'pluckValues').mockImplementationOnce(async (where) => {
      const rows = await pluck(where)
      await manager.invalidate('en')
      return rows
    })

    const result = await manager.get('en')

    expect(result.count).toBe(3)
    expect(await store.get('translations:export:en')).toBeNull()
  })

  it('caches the locale and tag lists', async () => {
    const locales = vi.spyOn(db.repositories.translation, 'getAvailableLocales')

    expect(await manager.getAvailableLocales()).toEqual(['en', 'fr'])
    expect(await manager.getAvailableLocales()).toEqual(['en', 'fr'])
    expect(await manager.getAvailableTags()).toEqual(['mobile', 'web'])
    expect(locales).toHaveBeenCalledTimes(1)
  })
})
