// =============================================================================
// TRANSLATION TYPES
// =============================================================================

import type {
  PaginationMeta,
  Tag,
  Translation,
  TranslationSort,
  TranslationWithTags,
  UpdateTranslationData,
} from '@catalog/shared'

// =============================================================================
// QUERY SHAPES
// =============================================================================

export interface StringContainsFilter {
  contains: string
  mode: 'insensitive'
}

export interface TranslationWhere {
  key?: StringContainsFilter
  value?: StringContainsFilter
  locale?: { equals: string }
  /** Translation must carry at least one of the named tags */
  tags?: { some: { name: { in: string[] } } }
}

/**
 * Executable listing query. Produced by the query builder, run either by the
 * Postgres repositories or by the in-memory database.
 */
export interface TranslationQuery {
  where: TranslationWhere
  orderBy: TranslationSort[]
  page: number
  limit: number
  skip: number
}

export interface PaginationResult<T> {
  data: T[]
  pagination: PaginationMeta
}

// =============================================================================
// REPOSITORY INPUTS
// =============================================================================

export interface CreateTranslationRecord {
  key: string
  value: string
  locale: string
}

export type UpdateTranslationRecord = UpdateTranslationData

export interface TranslationValueRow {
  key: string
  value: string
}

export interface TagAssignment {
  translationId: number
  tag: Tag
}

// =============================================================================
// STORE CONTRACTS
// =============================================================================

export interface TranslationStore {
  findById(id: number): Promise<Translation | null>
  findByIdOrThrow(id: number): Promise<Translation>
  findWithTags(id: number): Promise<TranslationWithTags | null>
  findByKeyAndLocale(key: string, locale: string): Promise<Translation | null>
  existsByKeyAndLocale(key: string, locale: string, excludeId?: number): Promise<boolean>
  create(data: CreateTranslationRecord): Promise<Translation>
  update(id: number, data: UpdateTranslationRecord): Promise<Translation>
  delete(id: number): Promise<Translation>
  count(): Promise<number>
  search(query: TranslationQuery): Promise<PaginationResult<TranslationWithTags>>
  pluckValues(where: TranslationWhere): Promise<TranslationValueRow[]>
  getAvailableLocales(): Promise<string[]>
  /** Replace the translation's tag associations with exactly `tagIds` */
  syncTags(translationId: number, tagIds: number[]): Promise<void>
}

export interface TagStore {
  findByName(name: string): Promise<Tag | null>
  findOrCreate(name: string): Promise<Tag>
  findOrCreateMany(names: string[]): Promise<Tag[]>
  findByTranslationIds(translationIds: number[]): Promise<TagAssignment[]>
  getAvailableNames(): Promise<string[]>
  count(): Promise<number>
}

export interface CatalogRepositories {
  translation: TranslationStore
  tag: TagStore
}

export interface DatabaseHealth {
  status: 'healthy' | 'unhealthy'
  latency?: number
  error?: string
}

/**
 * Entity store boundary: repositories plus an atomic unit of work. A rejected
 * transaction callback leaves the store unchanged.
 */
export interface CatalogDatabase {
  readonly repositories: CatalogRepositories
  transaction<T>(fn: (repositories: CatalogRepositories) => Promise<T>): Promise<T>
  healthCheck(): Promise<DatabaseHealth>
}
