// =============================================================================
// TRANSLATION REPOSITORY - POSTGRESQL
// =============================================================================
// Translation records, their tag associations and the listing/export queries

import type { QueryResultRow } from 'pg'
import { calculatePagination, type Translation, type TranslationWithTags } from '@catalog/shared'
import type { Queryable } from '../client'
import { BaseRepository } from './base.repository'
import { TagRepository } from './tag.repository'
import { compileExportQuery, compileTranslationQuery } from '../query/translation-query.sql'
import type {
  CreateTranslationRecord,
  PaginationResult,
  TranslationQuery,
  TranslationStore,
  TranslationValueRow,
  TranslationWhere,
  UpdateTranslationRecord,
} from '../types'
import { ensureDate, ensureNumber, ensureString } from '../utils/type-guards'
import { DatabaseError } from '../utils/errors'

export function toTranslationEntity(row: QueryResultRow): Translation {
  return {
    id: ensureNumber(row.id),
    key: ensureString(row.key),
    value: ensureString(row.value),
    locale: ensureString(row.locale),
    createdAt: ensureDate(row.created_at),
    updatedAt: ensureDate(row.updated_at),
  }
}

const UPDATABLE_COLUMNS = ['key', 'value', 'locale'] as const

export class TranslationRepository extends BaseRepository<Translation> implements TranslationStore {
  protected readonly modelName = 'Translation'
  protected readonly tableName = 'translations'
  private readonly tags: TagRepository

  constructor(db: Queryable, tags?: TagRepository) {
    super(db)
    this.tags = tags ?? new TagRepository(db)
  }

  protected toEntity(row: QueryResultRow): Translation {
    return toTranslationEntity(row)
  }

  /**
   * Find translation by its unique (key, locale) pair
   */
  async findByKeyAndLocale(key: string, locale: string): Promise<Translation | null> {
    return this.executeOne(
      'SELECT * FROM translations WHERE key = $1 AND locale = $2',
      [key, locale],
      'findByKeyAndLocale'
    )
  }

  /**
   * Whether another record already owns (key, locale)
   */
  async existsByKeyAndLocale(key: string, locale: string, excludeId?: number): Promise<boolean> {
    const values: unknown[] = [key, locale]
    let text = 'SELECT 1 FROM translations WHERE key = $1 AND locale = $2'
    if (excludeId !== undefined) {
      values.push(excludeId)
      text += ' AND id <> $3'
    }

    const result = await this.execute(`${text} LIMIT 1`, values, 'existsByKeyAndLocale')
    return result.rows.length > 0
  }

  async findWithTags(id: number): Promise<TranslationWithTags | null> {
    const translation = await this.findById(id)
    if (!translation) {
      return null
    }
    const [withTags] = await this.attachTags([translation])
    return withTags ?? null
  }

  /**
   * Create a new translation
   */
  async create(data: CreateTranslationRecord): Promise<Translation> {
    const created = await this.executeOne(
      'INSERT INTO translations (key, value, locale) VALUES ($1, $2, $3) RETURNING *',
      [data.key, data.value, data.locale],
      'create'
    )
    if (!created) {
      throw new DatabaseError('Translation insert returned no row')
    }
    return created
  }

  /**
   * Update the given columns; an empty update returns the record unchanged
   */
  async update(id: number, data: UpdateTranslationRecord): Promise<Translation> {
    const assignments: string[] = []
    const values: unknown[] = []

    for (const column of UPDATABLE_COLUMNS) {
      const value = data[column]
      if (value !== undefined) {
        values.push(value)
        assignments.push(`${column} = $${values.length}`)
      }
    }

    if (assignments.length === 0) {
      return this.findByIdOrThrow(id)
    }

    values.push(id)
    const updated = await this.executeOne(
      `UPDATE translations SET ${assignments.join(', ')}, updated_at = NOW() WHERE id = $${values.length} RETURNING *`,
      values,
      'update'
    )
    return updated ?? this.findByIdOrThrow(id)
  }

  /**
   * Paginated listing with tags attached
   */
  async search(query: TranslationQuery): Promise<PaginationResult<TranslationWithTags>> {
    const { select, count } = compileTranslationQuery(query)

    const [rows, totals] = await Promise.all([
      this.executeMany(select.text, select.values, 'search'),
      this.execute(count.text, count.values, 'search'),
    ])

    const [totalRow] = totals.rows
    const total = totalRow ? ensureNumber(totalRow.total) : 0

    return {
      data: await this.attachTags(rows),
      pagination: calculatePagination(query.page, query.limit, total),
    }
  }

  /**
   * Key/value pairs matching the predicate, ordered by key
   */
  async pluckValues(where: TranslationWhere): Promise<TranslationValueRow[]> {
    const { text, values } = compileExportQuery(where)
    const result = await this.execute(text, values, 'pluckValues')
    return result.rows.map((row) => ({ key: ensureString(row.key), value: ensureString(row.value) }))
  }

  /**
   * Get all available locales
   */
  async getAvailableLocales(): Promise<string[]> {
    const result = await this.execute(
      'SELECT DISTINCT locale FROM translations ORDER BY locale COLLATE "C" ASC',
      [],
      'getAvailableLocales'
    )
    return result.rows.map((row) => ensureString(row.locale))
  }

  /**
   * Replace the association set with exactly `tagIds`. Running it twice with
   * the same ids leaves one row per pair.
   */
  async syncTags(translationId: number, tagIds: number[]): Promise<void> {
    const uniqueIds = Array.from(new Set(tagIds))

    await this.execute(
      'DELETE FROM tag_translation WHERE translation_id = $1 AND NOT (tag_id = ANY($2::int[]))',
      [translationId, uniqueIds],
      'syncTags'
    )

    if (uniqueIds.length > 0) {
      await this.execute(
        `INSERT INTO tag_translation (tag_id, translation_id)
         SELECT tag_id, $1::int FROM UNNEST($2::int[]) AS tag_id
         ON CONFLICT (tag_id, translation_id) DO NOTHING`,
        [translationId, uniqueIds],
        'syncTags'
      )
    }
  }

  private async attachTags(translations: Translation[]): Promise<TranslationWithTags[]> {
    const assignments = await this.tags.findByTranslationIds(translations.map((translation) => translation.id))

    return translations.map((translation) => ({
      ...translation,
      tags: assignments
        .filter((assignment) => assignment.translationId === translation.id)
        .map((assignment) => assignment.tag),
    }))
  }
}
