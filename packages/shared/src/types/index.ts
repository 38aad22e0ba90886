// =============================================================================
// SHARED TYPES
// =============================================================================

// API Response Types
export interface ApiResponse<T = unknown> {
  success: boolean
  data?: T
  error?: string
  message?: string
  timestamp?: string
}

export interface PaginationMeta {
  page: number
  limit: number
  total: number
  totalPages: number
  hasNext: boolean
  hasPrev: boolean
}

// =============================================================================
// CATALOG TYPES
// =============================================================================

export interface Translation {
  id: number
  key: string
  value: string
  locale: string
  createdAt: Date
  updatedAt: Date
}

export interface Tag {
  id: number
  name: string
  createdAt: Date
  updatedAt: Date
}

export interface TranslationWithTags extends Translation {
  tags: Tag[]
}

/**
 * Unordered filter set shared by listings and exports. Every field is optional;
 * an empty filter matches every translation.
 */
export interface TranslationFilter {
  /** Case-insensitive substring of the logical key */
  key?: string
  /** Case-insensitive substring of the value */
  value?: string
  locale?: string
  /** Matches translations carrying at least one of these tags */
  tags?: string[]
}

export type TranslationSortField = 'id' | 'key' | 'locale' | 'createdAt' | 'updatedAt'

export type SortDirection = 'asc' | 'desc'

export interface TranslationSort {
  field: TranslationSortField
  direction: SortDirection
}

export interface TranslationExport {
  locale: string
  translations: Record<string, string>
  count: number
  generatedAt: string
}

export interface CreateTranslationData {
  key: string
  value: string
  locale: string
  tags?: string[]
}

export interface UpdateTranslationData {
  key?: string
  value?: string
  locale?: string
}
