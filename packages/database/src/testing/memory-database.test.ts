import { describe, it, expect, beforeEach } from 'vitest'
import { buildTranslationQuery } from '../query/translation-query.builder'
import { ConflictError } from '../utils/errors'
import { MemoryDatabase } from './memory-database'

describe('MemoryDatabase', () => {
  let db: MemoryDatabase

  beforeEach(() => {
    db = new MemoryDatabase()
  })

  it('rejects a duplicate (key, locale)', async () => {
    await db.repositories.translation.create({ key: 'welcome.msg', value: 'Welcome', locale: 'en' })

    await expect(
      db.repositories.translation.create({ key: 'welcome.msg', value: 'Hi', locale: 'en' })
    ).rejects.toBeInstanceOf(ConflictError)
    await expect(
      db.repositories.translation.create({ key: 'welcome.msg', value: 'Bienvenue', locale: 'fr' })
    ).resolves.toMatchObject({ id: 2 })
  })

  it('rolls back a failed transaction', async () => {
    await expect(
      db.transaction(async (repositories) => {
        const translation = await repositories.translation.create({ key: 'a', value: 'A', locale: 'en' })
        const [tag] = await repositories.tag.findOrCreateMany(['web'])
        await repositories.translation.syncTags(translation.id, tag ? [tag.id] : [])
        throw new Error('abort')
      })
    ).rejects.toThrow('abort')

    expect(await db.repositories.translation.count()).toBe(0)
    expect(await db.repositories.tag.count()).toBe(0)
    expect(db.countAssociations()).toBe(0)
  })

  it('runs transactions one after another', async () => {
    const order: string[] = []
    const first = db.transaction(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5))
      order.push('first')
    })
    const second = db.transaction(async () => {
      order.push('second')
    })

    await Promise.all([first, second])
    expect(order).toEqual(['first', 'second'])
  })

  it('keeps one association per pair when syncing twice', async () => {
    const translation = await db.repositories.translation.create({ key: 'a', value: 'A', locale: 'en' })
    const tags = await db.repositories.tag.findOrCreateMany(['web', 'mobile', 'web'])
    const ids = tags.map((tag) => tag.id)

    await db.repositories.translation.syncTags(translation.id, ids)
    await db.repositories.translation.syncTags(translation.id, ids)

    expect(tags).toHaveLength(2)
    expect(db.countAssociations()).toBe(2)
  })

  it('searches with tags attached', async () => {
    const first = await db.repositories.translation.create({ key: 'b.title', value: 'B', locale: 'en' })
    await db.repositories.translation.create({ key: 'a.title', value: 'A', locale: 'en' })
    const [web] = await db.repositories.tag.findOrCreateMany(['web'])
    await db.repositories.translation.syncTags(first.id, web ? [web.id] : [])

    const result = await db.repositories.translation.search(
      buildTranslationQuery({ tags: ['web'] }, { sort: { field: 'key', direction: 'asc' } })
    )

    expect(result.data.map((row) => row.key)).toEqual(['b.title'])
    expect(result.data[0]?.tags.map((tag) => tag.name)).toEqual(['web'])
    expect(result.pagination.total).toBe(1)
  })
})
