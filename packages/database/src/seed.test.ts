import { describe, it, expect } from 'vitest'
import { seedCatalog } from './seed'
import { MemoryDatabase } from './testing'

describe('seedCatalog', () => {
  it('creates translations in chunks and reports progress', async () => {
    const db = new MemoryDatabase()
    const progress: number[] = []

    const result = await seedCatalog(db, {
      translations: 12,
      chunkSize: 5,
      locales: ['en', 'fr'],
      tags: ['a', 'b', 'c', 'd'],
      onProgress: (seeded) => progress.push(seeded),
    })

    expect(result).toEqual({ translations: 12, tags: 4 })
    expect(progress).toEqual([5, 10, 12])
    expect(await db.repositories.translation.count()).toBe(12)
    expect(await db.repositories.translation.getAvailableLocales()).toEqual(['en', 'fr'])
    expect(db.countAssociations()).toBe(24)
  })

  it('skips records that already exist', async () => {
    const db = new MemoryDatabase()
    const options = { translations: 6, locales: ['en', 'fr'], tags: ['a', 'b', 'c', 'd'] }

    await seedCatalog(db, options)
    await seedCatalog(db, options)

    expect(await db.repositories.translation.count()).toBe(6)
  })
})
