// =============================================================================
// CACHE STORE TYPES
// =============================================================================

/**
 * Key/value store with per-entry expiry. Values are plain JSON data; callers
 * validate what they read back.
 */
export interface CacheStore {
  readonly name: string
  get(key: string): Promise<unknown>
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>
  /** Resolves true when an entry was removed */
  delete(key: string): Promise<boolean>
  /**
   * Keys currently stored that start with `prefix`. Stores that cannot
   * enumerate leave this undefined.
   */
  listKeys?(prefix: string): Promise<string[]>
  ping(): Promise<boolean>
  close(): Promise<void>
}

export interface CacheStats {
  hits: number
  misses: number
  sets: number
  deletes: number
  evictions: number
  size: number
  maxSize: number
  hitRate: number
}
