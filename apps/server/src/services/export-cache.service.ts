// =============================================================================
// EXPORT CACHE MANAGER
// =============================================================================
// Read-through cache for per-locale exports and the locale/tag lists, with
// invalidation on every committed mutation.

import { z } from 'zod'
import {
  AUXILIARY_CACHE_KEYS,
  CACHE_KEYS,
  CACHE_TTL,
  deriveExportCacheKey,
  exportCacheKeyPrefix,
  isExportCacheKeyForLocale,
  normalizeTagNames,
  type TranslationExport,
} from '@catalog/shared'
import { buildExportWhere, type CatalogDatabase } from '@catalog/database'
import type { InvalidationStrategy } from '../config'
import type { CacheStore } from '../types/cache.types'
import { Logger } from '../utils/logger'

export interface ExportCacheOptions {
  /** Export entry TTL in seconds */
  exportTtl?: number
  /** Locale and tag list TTL in seconds */
  listsTtl?: number
  strategy?: InvalidationStrategy
}

export interface InvalidationResult {
  locale: string
  strategy: InvalidationStrategy
  deletedKeys: string[]
  /** Keys whose delete was rejected by the store */
  failedKeys: string[]
}

// Checked in place: z.record rebuilds the map and would drop a "__proto__" key
const stringMapSchema = z.custom<Record<string, string>>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((entry) => typeof entry === 'string'),
  'Expected a map of strings'
)

const translationExportSchema = z.object({
  locale: z.string(),
  translations: stringMapSchema,
  count: z.number(),
  generatedAt: z.string(),
})

const nameListSchema = z.array(z.string())

export class ExportCacheManager {
  public readonly strategy: InvalidationStrategy
  private readonly exportTtl: number
  private readonly listsTtl: number
  // Bumped by invalidate(); a miss computed under an older generation is not stored
  private readonly generations = new Map<string, number>()
  private listsGeneration = 0

  constructor(
    private readonly db: CatalogDatabase,
    private readonly store: CacheStore,
    options: ExportCacheOptions = {}
  ) {
    const requested = options.strategy ?? 'prefix'
    this.exportTtl = options.exportTtl ?? CACHE_TTL.EXPORT
    this.listsTtl = options.listsTtl ?? CACHE_TTL.LISTS

    if (requested === 'prefix' && !store.listKeys) {
      Logger.warn('Cache store cannot enumerate keys; falling back to basic invalidation', {
        store: store.name,
      })
      this.strategy = 'basic'
    } else {
      this.strategy = requested
    }
  }

  /**
   * Export for `locale`, optionally restricted to translations carrying any
   * of `tagNames`.
   */
  async get(locale: string, tagNames?: readonly string[]): Promise<TranslationExport> {
    const tags = normalizeTagNames(tagNames)
    const key = deriveExportCacheKey(locale, tags)

    const cached = await this.read(key, translationExportSchema)
    if (cached) {
      Logger.logCache('hit', { key })
      return cached
    }

    const generation = this.generationOf(locale)
    const startedAt = Date.now()
    const rows = await this.db.repositories.translation.pluckValues(buildExportWhere(locale, tags))
    const entry: TranslationExport = {
      locale,
      translations: Object.fromEntries(rows.map((row) => [row.key, row.value])),
      count: rows.length,
      generatedAt: new Date().toISOString(),
    }
    Logger.logPerformance('export build', Date.now() - startedAt, { key, count: entry.count })

    if (generation === this.generationOf(locale)) {
      await this.write(key, entry, this.exportTtl)
    } else {
      Logger.logCache('discarded export computed before invalidation', { key })
    }

    return entry
  }

  async getAvailableLocales(): Promise<string[]> {
    return this.readList(CACHE_KEYS.AVAILABLE_LOCALES, () =>
      this.db.repositories.translation.getAvailableLocales()
    )
  }

  async getAvailableTags(): Promise<string[]> {
    return this.readList(CACHE_KEYS.AVAILABLE_TAGS, () => this.db.repositories.tag.getAvailableNames())
  }

  /**
   * Remove every cached export of `locale` and the auxiliary lists. Under
   * the basic strategy only the untagged export is removed; tag-filtered
   * exports expire on their TTL. A failed key listing degrades this call to
   * the basic key set, and each key is deleted independently.
   */
  async invalidate(locale: string): Promise<InvalidationResult> {
    this.generations.set(locale, this.generationOf(locale) + 1)
    this.listsGeneration++

    const base = exportCacheKeyPrefix(locale)
    const keys = new Set<string>([base, ...AUXILIARY_CACHE_KEYS])
    let strategy = this.strategy

    if (strategy === 'prefix') {
      try {
        const listed = (await this.store.listKeys?.(base)) ?? []
        for (const key of listed) {
          if (isExportCacheKeyForLocale(key, locale)) {
            keys.add(key)
          }
        }
      } catch (error) {
        Logger.warn('Cache key listing failed; invalidating base and list keys only', {
          locale,
          store: this.store.name,
          error: error instanceof Error ? error.message : String(error),
        })
        strategy = 'basic'
      }
    }

    const targets = Array.from(keys)
    const outcomes = await Promise.allSettled(targets.map((key) => this.store.delete(key)))

    const deletedKeys: string[] = []
    const failedKeys: string[] = []
    outcomes.forEach((outcome, index) => {
      const key = targets[index]
      if (outcome.status === 'rejected') {
        failedKeys.push(key)
      } else if (outcome.value) {
        deletedKeys.push(key)
      }
    })

    if (failedKeys.length > 0) {
      Logger.warn('Cache keys could not be deleted', { locale, failedKeys })
    }

    Logger.logCache('invalidated', { locale, strategy, deletedKeys })
    return { locale, strategy, deletedKeys, failedKeys }
  }

  private generationOf(locale: string): number {
    return this.generations.get(locale) ?? 0
  }

  private async readList(key: string, load: () => Promise<string[]>): Promise<string[]> {
    const cached = await this.read(key, nameListSchema)
    if (cached) {
      return cached
    }

    const generation = this.listsGeneration
    const names = await load()
    if (generation === this.listsGeneration) {
      await this.write(key, names, this.listsTtl)
    }
    return names
  }

  /**
   * A failing or malformed read is a miss
   */
  private async read<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
    let raw: unknown
    try {
      raw = await this.store.get(key)
    } catch (error) {
      Logger.warn('Cache read failed; falling back to the database', {
        key,
        error: error instanceof Error ? error.message : String(error),
      })
      return null
    }

    if (raw === null || raw === undefined) {
      return null
    }

    const parsed = schema.safeParse(raw)
    if (!parsed.success) {
      Logger.warn('Ignoring malformed cache entry', { key })
      return null
    }
    return parsed.data
  }

  private async write(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    try {
      await this.store.set(key, value, ttlSeconds)
    } catch (error) {
      Logger.warn('Cache write failed', {
        key,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }
}
