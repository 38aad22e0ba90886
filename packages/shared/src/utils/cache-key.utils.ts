// =============================================================================
// EXPORT CACHE KEYS
// =============================================================================

import { CACHE_KEYS } from '../constants'

const { EXPORT_NAMESPACE, TAG_SEGMENT, SEGMENT_SEPARATOR, TAG_SEPARATOR } = CACHE_KEYS

/**
 * Deduplicates (exact, case-sensitive) and sorts tag names by code unit order.
 * Empty names are dropped.
 */
export function normalizeTagNames(tagNames?: readonly string[] | null): string[] {
  if (!tagNames || tagNames.length === 0) {
    return []
  }

  const unique = new Set(tagNames.filter((name) => name.length > 0))
  return Array.from(unique).sort()
}

/**
 * Base key for a locale's untagged export. Every export key for the locale is
 * either this key or this key followed by a segment separator.
 */
export function exportCacheKeyPrefix(locale: string): string {
  return `${EXPORT_NAMESPACE}${SEGMENT_SEPARATOR}${encodeURIComponent(locale)}`
}

/**
 * Canonical cache key for an export request. Independent of the order and
 * multiplicity of `tagNames`; an absent or empty tag list yields the base key.
 *
 * @example
 * deriveExportCacheKey('en', ['web', 'mobile', 'web'])
 * // => 'translations:export:en:tags:mobile,web'
 */
export function deriveExportCacheKey(locale: string, tagNames?: readonly string[] | null): string {
  const base = exportCacheKeyPrefix(locale)
  const tags = normalizeTagNames(tagNames)

  if (tags.length === 0) {
    return base
  }

  // Names are percent-encoded so a name containing the separator cannot collide
  const suffix = tags.map((name) => encodeURIComponent(name)).join(TAG_SEPARATOR)
  return `${base}${SEGMENT_SEPARATOR}${TAG_SEGMENT}${SEGMENT_SEPARATOR}${suffix}`
}

export function isExportCacheKeyForLocale(key: string, locale: string): boolean {
  const base = exportCacheKeyPrefix(locale)
  return key === base || key.startsWith(`${base}${SEGMENT_SEPARATOR}`)
}

export const AUXILIARY_CACHE_KEYS: readonly string[] = [
  CACHE_KEYS.AVAILABLE_LOCALES,
  CACHE_KEYS.AVAILABLE_TAGS
]
