import { EventEmitter } from "events"
import {
  normalizeTagNames,
  type CreateTranslationData,
  type TranslationExport,
  type TranslationFilter,
  type TranslationWithTags,
  type UpdateTranslationData,
} from "@catalog/shared"
import {
  buildTranslationQuery,
  type CatalogDatabase,
  type CatalogRepositories,
  type PaginationResult,
  type TranslationQueryOptions,
} from "@catalog/database"
import { ConflictError, NotFoundError, processError } from "../utils/errors"
import { Logger } from "../utils/logger"
import type { ExportCacheManager } from "./export-cache.service"

/**
 * Coordinates writes: validation against the store, one transaction per
 * mutation, then export cache invalidation once the transaction committed.
 *
 * Emits `translation:created`, `translation:updated` (with the previous
 * state as second argument) and `translation:deleted`.
 */
export class TranslationService extends EventEmitter {
  constructor(
    private readonly db: CatalogDatabase,
    private readonly exportCache: ExportCacheManager
  ) {
    super()
  }

  /**
   * Create a translation with its tags
   */
  async create(data: CreateTranslationData): Promise<TranslationWithTags> {
    const translation = await this.guard(async () => {
      const { key, value, locale } = data
      if (await this.db.repositories.translation.existsByKeyAndLocale(key, locale)) {
        throw this.duplicate(key, locale)
      }

      return this.db.transaction(async (repositories) => {
        const created = await repositories.translation.create({ key, value, locale })
        if (data.tags !== undefined) {
          await this.syncTags(repositories, created.id, data.tags)
        }
        return this.loadWithTags(repositories, created.id)
      })
    })

    await this.invalidate([translation.locale])

    this.emit("translation:created", translation)
    Logger.info("Translation created", {
      id: translation.id,
      key: translation.key,
      locale: translation.locale,
    })

    return translation
  }

  /**
   * Update fields and, when `tags` is given, replace the tag set. An empty
   * list removes every tag; leaving it undefined keeps them.
   */
  async update(id: number, data: UpdateTranslationData, tags?: string[]): Promise<TranslationWithTags> {
    const { previous, updated } = await this.guard(async () => {
      const current = await this.db.repositories.translation.findWithTags(id)
      if (!current) {
        throw new NotFoundError("Translation")
      }

      const key = data.key ?? current.key
      const locale = data.locale ?? current.locale
      const identityChanged = key !== current.key || locale !== current.locale
      if (identityChanged && (await this.db.repositories.translation.existsByKeyAndLocale(key, locale, id))) {
        throw this.duplicate(key, locale)
      }

      const result = await this.db.transaction(async (repositories) => {
        await repositories.translation.update(id, data)
        if (tags !== undefined) {
          await this.syncTags(repositories, id, tags)
        }
        return this.loadWithTags(repositories, id)
      })

      return { previous: current, updated: result }
    })

    await this.invalidate([previous.locale, updated.locale])

    this.emit("translation:updated", updated, previous)
    Logger.info("Translation updated", {
      id,
      key: updated.key,
      locale: updated.locale,
      previousLocale: previous.locale !== updated.locale ? previous.locale : undefined,
    })

    return updated
  }

  async delete(id: number): Promise<void> {
    const removed = await this.guard(async () => {
      const current = await this.db.repositories.translation.findWithTags(id)
      if (!current) {
        throw new NotFoundError("Translation")
      }

      await this.db.transaction((repositories) => repositories.translation.delete(id))
      return current
    })

    await this.invalidate([removed.locale])

    this.emit("translation:deleted", removed)
    Logger.info("Translation deleted", { id, key: removed.key, locale: removed.locale })
  }

  async findById(id: number): Promise<TranslationWithTags> {
    const translation = await this.guard(() => this.db.repositories.translation.findWithTags(id))
    if (!translation) {
      throw new NotFoundError("Translation")
    }
    return translation
  }

  async search(
    filter: TranslationFilter,
    options: TranslationQueryOptions = {}
  ): Promise<PaginationResult<TranslationWithTags>> {
    const query = buildTranslationQuery(filter, options)
    return this.guard(() => this.db.repositories.translation.search(query))
  }

  async export(locale: string, tags?: string[]): Promise<TranslationExport> {
    return this.guard(() => this.exportCache.get(locale, tags))
  }

  async getAvailableLocales(): Promise<string[]> {
    return this.guard(() => this.exportCache.getAvailableLocales())
  }

  async getAvailableTags(): Promise<string[]> {
    return this.guard(() => this.exportCache.getAvailableTags())
  }

  private async syncTags(repositories: CatalogRepositories, translationId: number, names: string[]): Promise<void> {
    const tags = await repositories.tag.findOrCreateMany(normalizeTagNames(names))
    await repositories.translation.syncTags(translationId, tags.map((tag) => tag.id))
  }

  private async loadWithTags(repositories: CatalogRepositories, id: number): Promise<TranslationWithTags> {
    const translation = await repositories.translation.findWithTags(id)
    if (!translation) {
      throw new NotFoundError("Translation")
    }
    return translation
  }

  /**
   * Invalidation runs after commit; a failure is logged and the mutation
   * still succeeds.
   */
  private async invalidate(locales: string[]): Promise<void> {
    for (const locale of new Set(locales)) {
      try {
        await this.exportCache.invalidate(locale)
      } catch (error) {
        Logger.error("Export cache invalidation failed", {
          locale,
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }
  }

  private duplicate(key: string, locale: string): ConflictError {
    return new ConflictError(`Translation "${key}" already exists for locale "${locale}"`, { key, locale })
  }

  private async guard<T>(work: () => Promise<T>): Promise<T> {
    try {
      return await work()
    } catch (error) {
      throw processError(error)
    }
  }
}
