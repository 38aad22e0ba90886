// =============================================================================
// SHARED CONSTANTS
// =============================================================================

// =============================================================================
// API CONSTANTS
// =============================================================================

export const API_ENDPOINTS = {
  TRANSLATIONS: {
    LIST: '/translations',
    SEARCH: '/search/translations',
    CREATE: '/translations',
    EXPORT: '/translations/export',
    LOCALES: '/translations/locales',
    TAGS: '/translations/tags',
    GET: (id: number | string) => `/translations/${id}`,
    UPDATE: (id: number | string) => `/translations/${id}`,
    DELETE: (id: number | string) => `/translations/${id}`
  }
} as const

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const

// =============================================================================
// PAGINATION CONSTANTS
// =============================================================================

export const PAGINATION = {
  DEFAULT_PAGE: 1,
  DEFAULT_LIMIT: 15,
  MAX_LIMIT: 100,
  MIN_LIMIT: 1
} as const

// =============================================================================
// CACHE CONSTANTS
// =============================================================================

export const CACHE_KEYS = {
  EXPORT_NAMESPACE: 'translations:export',
  TAG_SEGMENT: 'tags',
  SEGMENT_SEPARATOR: ':',
  TAG_SEPARATOR: ',',
  AVAILABLE_LOCALES: 'translations:locales',
  AVAILABLE_TAGS: 'translations:tags'
} as const

// Seconds
export const CACHE_TTL = {
  EXPORT: 300,
  LISTS: 3600
} as const

// =============================================================================
// VALIDATION CONSTANTS
// =============================================================================

export const VALIDATION_RULES = {
  TRANSLATION: {
    KEY_MAX_LENGTH: 255,
    LOCALE_MAX_LENGTH: 10,
    // translations.id is SERIAL (int4)
    ID_MAX: 2147483647
  },
  TAG: {
    NAME_MAX_LENGTH: 255
  }
} as const

export const REGEX_PATTERNS = {
  LOCALE: /^[A-Za-z0-9_-]+$/,
  NUMERIC_ID: /^[1-9]\d*$/
} as const

export const DEFAULT_EXPORT_LOCALE = 'en'
