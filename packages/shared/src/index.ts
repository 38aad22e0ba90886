// =============================================================================
// SHARED PACKAGE EXPORTS
// =============================================================================

// Constants
export * from './constants'

// Types
export * from './types'

// Utilities
export * from './utils'

// Validations
export * from './validations'
