export * from './cache-key.utils'
export * from './pagination.utils'
