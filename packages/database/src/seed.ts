// =============================================================================
// DATABASE SEEDING
// =============================================================================
// Fills the catalog with sample translations spread over locales and tags.

import type { CatalogDatabase } from './types'

export interface SeedOptions {
  translations?: number
  chunkSize?: number
  locales?: string[]
  tags?: string[]
  onProgress?: (seeded: number) => void
}

export interface SeedResult {
  translations: number
  tags: number
}

const DEFAULT_LOCALES = ['en', 'fr', 'de', 'es', 'it']
const DEFAULT_TAGS = ['web', 'mobile', 'desktop', 'admin', 'email', 'checkout', 'onboarding', 'errors', 'marketing', 'legal']

/**
 * Deterministic sample data: translation `i` gets locale `i % locales` and
 * one to three tags picked by index, so repeated runs produce the same catalog.
 */
export async function seedCatalog(db: CatalogDatabase, options: SeedOptions = {}): Promise<SeedResult> {
  const total = options.translations ?? 1000
  const chunkSize = Math.max(1, options.chunkSize ?? 100)
  const locales = options.locales ?? DEFAULT_LOCALES
  const tagNames = options.tags ?? DEFAULT_TAGS

  const tags = await db.transaction((repositories) => repositories.tag.findOrCreateMany(tagNames))

  let seeded = 0
  while (seeded < total) {
    const end = Math.min(total, seeded + chunkSize)

    await db.transaction(async (repositories) => {
      for (let i = seeded; i < end; i++) {
        const locale = locales[i % locales.length] ?? 'en'
        const key = `sample.${Math.floor(i / locales.length)}.label`
        if (await repositories.translation.existsByKeyAndLocale(key, locale)) {
          continue
        }

        const translation = await repositories.translation.create({
          key,
          value: `Sample text ${i} (${locale})`,
          locale,
        })

        const tagCount = (i % 3) + 1
        const assigned = tags.length === 0
          ? []
          : Array.from({ length: tagCount }, (_, offset) => tags[(i + offset * 3) % tags.length].id)
        await repositories.translation.syncTags(translation.id, assigned)
      }
    })

    seeded = end
    options.onProgress?.(seeded)
  }

  return { translations: seeded, tags: tags.length }
}
