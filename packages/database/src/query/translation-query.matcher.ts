// =============================================================================
// TRANSLATION QUERY - IN-MEMORY EVALUATION
// =============================================================================

import type { Translation, TranslationSort } from '@catalog/shared'
import type { TranslationWhere } from '../types'

function containsInsensitive(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase())
}

export function matchesTranslationWhere(
  translation: Translation,
  tagNames: readonly string[],
  where: TranslationWhere
): boolean {
  if (where.key && !containsInsensitive(translation.key, where.key.contains)) {
    return false
  }

  if (where.value && !containsInsensitive(translation.value, where.value.contains)) {
    return false
  }

  if (where.locale && translation.locale !== where.locale.equals) {
    return false
  }

  if (where.tags) {
    const wanted = where.tags.some.name.in
    if (!tagNames.some((name) => wanted.includes(name))) {
      return false
    }
  }

  return true
}

// Strings compare by code unit, matching COLLATE "C"
function compareValues(a: string | number | Date, b: string | number | Date): number {
  if (typeof a === 'string' && typeof b === 'string') {
    if (a < b) return -1
    if (a > b) return 1
    return 0
  }

  const left = a instanceof Date ? a.getTime() : Number(a)
  const right = b instanceof Date ? b.getTime() : Number(b)
  return left - right
}

export function compareTranslations(orderBy: readonly TranslationSort[]) {
  return (a: Translation, b: Translation): number => {
    for (const { field, direction } of orderBy) {
      const result = compareValues(a[field], b[field])
      if (result !== 0) {
        return direction === 'desc' ? -result : result
      }
    }
    return 0
  }
}
