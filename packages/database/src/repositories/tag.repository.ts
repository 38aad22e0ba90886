// =============================================================================
// TAG REPOSITORY - POSTGRESQL
// =============================================================================

import type { QueryResultRow } from 'pg'
import type { Tag } from '@catalog/shared'
import { BaseRepository } from './base.repository'
import type { TagAssignment, TagStore } from '../types'
import { ensureDate, ensureNumber, ensureString } from '../utils/type-guards'
import { DatabaseError } from '../utils/errors'

export function toTagEntity(row: QueryResultRow): Tag {
  return {
    id: ensureNumber(row.id),
    name: ensureString(row.name),
    createdAt: ensureDate(row.created_at),
    updatedAt: ensureDate(row.updated_at),
  }
}

export class TagRepository extends BaseRepository<Tag> implements TagStore {
  protected readonly modelName = 'Tag'
  protected readonly tableName = 'tags'

  protected toEntity(row: QueryResultRow): Tag {
    return toTagEntity(row)
  }

  /**
   * Find tag by its unique name
   */
  async findByName(name: string): Promise<Tag | null> {
    return this.executeOne('SELECT * FROM tags WHERE name = $1', [name], 'findByName')
  }

  /**
   * Insert the tag unless the name is already taken, then return the stored row
   */
  async findOrCreate(name: string): Promise<Tag> {
    const inserted = await this.executeOne(
      'INSERT INTO tags (name) VALUES ($1) ON CONFLICT (name) DO NOTHING RETURNING *',
      [name],
      'findOrCreate'
    )
    if (inserted) {
      return inserted
    }

    const existing = await this.findByName(name)
    if (!existing) {
      throw new DatabaseError(`Tag "${name}" vanished during findOrCreate`)
    }
    return existing
  }

  /**
   * Find or create each distinct name, preserving first-seen order
   */
  async findOrCreateMany(names: string[]): Promise<Tag[]> {
    const tags: Tag[] = []
    for (const name of new Set(names)) {
      tags.push(await this.findOrCreate(name))
    }
    return tags
  }

  async findByTranslationIds(translationIds: number[]): Promise<TagAssignment[]> {
    if (translationIds.length === 0) {
      return []
    }

    const result = await this.execute(
      `SELECT tt.translation_id, g.*
         FROM tag_translation tt
         INNER JOIN tags g ON g.id = tt.tag_id
        WHERE tt.translation_id = ANY($1)
        ORDER BY g.name COLLATE "C" ASC`,
      [translationIds],
      'findByTranslationIds'
    )

    return result.rows.map((row) => ({
      translationId: ensureNumber(row.translation_id),
      tag: toTagEntity(row),
    }))
  }

  /**
   * All tag names, sorted
   */
  async getAvailableNames(): Promise<string[]> {
    const result = await this.execute(
      'SELECT name FROM tags ORDER BY name COLLATE "C" ASC',
      [],
      'getAvailableNames'
    )
    return result.rows.map((row) => ensureString(row.name))
  }
}
