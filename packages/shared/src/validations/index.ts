// =============================================================================
// SHARED VALIDATIONS
// =============================================================================

import { z } from 'zod'
import { VALIDATION_RULES, REGEX_PATTERNS, DEFAULT_EXPORT_LOCALE } from '../constants'

// =============================================================================
// TRANSLATION VALIDATIONS
// =============================================================================

export const translationValidation = {
  key: z
    .string({ required_error: 'Key is required' })
    .trim()
    .min(1, 'Key is required')
    .max(VALIDATION_RULES.TRANSLATION.KEY_MAX_LENGTH, 'Key is too long'),

  value: z
    .string({ required_error: 'Value is required' })
    .min(1, 'Value is required'),

  locale: z
    .string({ required_error: 'Locale is required' })
    .trim()
    .min(1, 'Locale is required')
    .max(VALIDATION_RULES.TRANSLATION.LOCALE_MAX_LENGTH, 'Locale is too long')
    .regex(REGEX_PATTERNS.LOCALE, 'Locale may only contain letters, numbers, underscores and hyphens'),

  tags: z.array(
    z
      .string()
      .trim()
      .min(1, 'Tag name cannot be empty')
      .max(VALIDATION_RULES.TAG.NAME_MAX_LENGTH, 'Tag name is too long')
  )
}

export const createTranslationSchema = z.object({
  key: translationValidation.key,
  value: translationValidation.value,
  locale: translationValidation.locale,
  tags: translationValidation.tags.optional()
})

export const updateTranslationSchema = z
  .object({
    key: translationValidation.key.optional(),
    value: translationValidation.value.optional(),
    locale: translationValidation.locale.optional(),
    tags: translationValidation.tags.optional()
  })
  .refine(
    (data) => Object.values(data).some((field) => field !== undefined),
    { message: 'At least one field must be provided' }
  )

export const translationIdSchema = z.object({
  id: z
    .string()
    .regex(REGEX_PATTERNS.NUMERIC_ID, 'Invalid translation id')
    .transform((id) => Number(id))
    .refine((id) => id <= VALIDATION_RULES.TRANSLATION.ID_MAX, 'Invalid translation id')
})

// =============================================================================
// QUERY VALIDATIONS
// =============================================================================

/**
 * Accepts `?tags=a,b`, `?tags=a&tags=b` and `?tags[]=a`. Blank names are dropped.
 */
export const tagListParam = z
  .union([z.string(), z.array(z.string())])
  .transform((raw) =>
    (Array.isArray(raw) ? raw : raw.split(','))
      .map((name) => name.trim())
      .filter((name) => name.length > 0)
  )

// Page numbers are clamped later, so anything is accepted here
const looseNumber = z.union([z.string(), z.number()]).optional()

export const translationSearchQuerySchema = z.object({
  key: z.string().optional(),
  content: z.string().optional(),
  value: z.string().optional(),
  locale: z.string().trim().min(1).optional(),
  tags: tagListParam.optional(),
  page: looseNumber,
  per_page: looseNumber,
  sort: z.enum(['id', 'key', 'locale', 'createdAt', 'updatedAt']).optional(),
  order: z.enum(['asc', 'desc']).optional()
})

export const translationExportQuerySchema = z.object({
  locale: translationValidation.locale.default(DEFAULT_EXPORT_LOCALE),
  tags: tagListParam.optional()
})
