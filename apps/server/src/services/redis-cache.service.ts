import type { CacheStore } from "../types/cache.types"
import { Logger } from "../utils/logger"

/**
 * The ioredis commands the store relies on. `Redis` instances satisfy it.
 */
export interface RedisCommands {
  options: { keyPrefix?: string }
  get(key: string): Promise<string | null>
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>
  del(...keys: string[]): Promise<number>
  scan(
    cursor: string,
    patternToken: "MATCH",
    pattern: string,
    countToken: "COUNT",
    count: number
  ): Promise<[cursor: string, elements: string[]]>
  ping(): Promise<string>
  quit(): Promise<unknown>
}

const SCAN_BATCH_SIZE = 100

function escapeGlob(input: string): string {
  return input.replace(/[*?[\]\\]/g, (char) => `\\${char}`)
}

/**
 * Redis-backed store. Values are JSON; expiry uses SET EX. The client's
 * `keyPrefix` is applied by ioredis to commands but not to SCAN patterns or
 * results, so listKeys adds and strips it here.
 */
export class RedisCacheStore implements CacheStore {
  public readonly name = "redis"

  constructor(private readonly client: RedisCommands) {}

  private get keyPrefix(): string {
    return this.client.options.keyPrefix ?? ""
  }

  async get(key: string): Promise<unknown> {
    const raw = await this.client.get(key)
    if (raw === null) {
      return null
    }

    try {
      const parsed: unknown = JSON.parse(raw)
      return parsed
    } catch (error) {
      Logger.warn("Discarding unparseable cache entry", {
        key,
        error: error instanceof Error ? error.message : String(error),
      })
      await this.client.del(key)
      return null
    }
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    await this.client.set(key, JSON.stringify(value), "EX", Math.max(1, Math.ceil(ttlSeconds)))
  }

  async delete(key: string): Promise<boolean> {
    return (await this.client.del(key)) > 0
  }

  async listKeys(prefix: string): Promise<string[]> {
    const keyPrefix = this.keyPrefix
    const pattern = `${escapeGlob(keyPrefix)}${escapeGlob(prefix)}*`
    const keys = new Set<string>()
    let cursor = "0"

    do {
      const [next, batch] = await this.client.scan(cursor, "MATCH", pattern, "COUNT", SCAN_BATCH_SIZE)
      for (const key of batch) {
        keys.add(key.startsWith(keyPrefix) ? key.slice(keyPrefix.length) : key)
      }
      cursor = next
    } while (cursor !== "0")

    return Array.from(keys)
  }

  async ping(): Promise<boolean> {
    return (await this.client.ping()) === "PONG"
  }

  async close(): Promise<void> {
    await this.client.quit()
  }
}
