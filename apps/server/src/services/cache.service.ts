import type { CacheStats, CacheStore } from "../types/cache.types"
import { Logger } from "../utils/logger"

export interface MemoryCacheOptions {
  ttl?: number // Default time to live in seconds
  maxSize?: number // Maximum number of items
  checkPeriod?: number // Expiry sweep interval in seconds
}

interface CacheItem {
  value: unknown
  expiresAt: number
}

/**
 * In-process cache store. Map insertion order doubles as recency order: reads
 * move an entry to the end, eviction removes from the front.
 */
export class MemoryCacheStore implements CacheStore {
  public readonly name = "memory"
  private cache: Map<string, CacheItem> = new Map()
  private stats: CacheStats = {
    hits: 0,
    misses: 0,
    sets: 0,
    deletes: 0,
    evictions: 0,
    size: 0,
    maxSize: 1000,
    hitRate: 0,
  }
  private cleanupInterval: NodeJS.Timeout
  private defaultTtl: number
  private maxSize: number

  constructor(options: MemoryCacheOptions = {}) {
    this.defaultTtl = options.ttl || 300
    this.maxSize = options.maxSize || 1000
    this.stats.maxSize = this.maxSize

    this.cleanupInterval = setInterval(() => {
      this.cleanup()
    }, (options.checkPeriod || 60) * 1000)
    this.cleanupInterval.unref()

    Logger.debug("Memory cache store initialized", {
      defaultTtl: this.defaultTtl,
      maxSize: this.maxSize,
    })
  }

  /**
   * Get value from cache
   */
  async get(key: string): Promise<unknown> {
    const item = this.cache.get(key)

    if (!item) {
      this.recordMiss()
      return null
    }

    if (Date.now() >= item.expiresAt) {
      this.cache.delete(key)
      this.recordMiss()
      return null
    }

    // Refresh recency
    this.cache.delete(key)
    this.cache.set(key, item)
    this.stats.hits++
    this.updateHitRate()

    return item.value
  }

  /**
   * Set value in cache
   */
  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const ttl = (ttlSeconds || this.defaultTtl) * 1000

    if (this.cache.has(key)) {
      this.cache.delete(key)
    } else if (this.cache.size >= this.maxSize) {
      this.evictLeastRecentlyUsed()
    }

    this.cache.set(key, { value, expiresAt: Date.now() + ttl })
    this.stats.sets++
    this.stats.size = this.cache.size
  }

  /**
   * Delete value from cache
   */
  async delete(key: string): Promise<boolean> {
    const deleted = this.cache.delete(key)

    if (deleted) {
      this.stats.deletes++
      this.stats.size = this.cache.size
    }

    return deleted
  }

  /**
   * Live keys starting with `prefix`
   */
  async listKeys(prefix: string): Promise<string[]> {
    const now = Date.now()
    const keys: string[] = []

    for (const [key, item] of this.cache) {
      if (item.expiresAt > now && key.startsWith(prefix)) {
        keys.push(key)
      }
    }

    return keys
  }

  async ping(): Promise<boolean> {
    return true
  }

  getStats(): CacheStats {
    return { ...this.stats }
  }

  async close(): Promise<void> {
    clearInterval(this.cleanupInterval)
    this.cache.clear()
    this.stats.size = 0
  }

  private cleanup(): void {
    const now = Date.now()
    let expiredCount = 0

    for (const [key, item] of this.cache) {
      if (item.expiresAt <= now) {
        this.cache.delete(key)
        expiredCount++
      }
    }

    if (expiredCount > 0) {
      this.stats.size = this.cache.size
      Logger.logCache("cleanup completed", { expiredCount })
    }
  }

  /**
   * Remove the oldest 10% of entries
   */
  private evictLeastRecentlyUsed(): void {
    const toRemove = Math.max(1, Math.floor(this.cache.size * 0.1))
    const victims = Array.from(this.cache.keys()).slice(0, toRemove)

    for (const key of victims) {
      this.cache.delete(key)
    }

    this.stats.evictions += victims.length
    this.stats.size = this.cache.size
    Logger.logCache("LRU eviction", { removedCount: victims.length })
  }

  private recordMiss(): void {
    this.stats.misses++
    this.stats.size = this.cache.size
    this.updateHitRate()
  }

  private updateHitRate(): void {
    const total = this.stats.hits + this.stats.misses
    this.stats.hitRate = total > 0 ? (this.stats.hits / total) * 100 : 0
  }
}
