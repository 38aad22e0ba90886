// =============================================================================
// SERVER ENTRY POINT
// =============================================================================

import Redis from 'ioredis'
import { connectDatabase, createPool, DatabaseService } from '@catalog/database'
import { createApp } from './app'
import { config, validateConfig } from './config'
import { MemoryCacheStore } from './services/cache.service'
import { ExportCacheManager } from './services/export-cache.service'
import { RedisCacheStore } from './services/redis-cache.service'
import { TranslationService } from './services/translation.service'
import type { CacheStore } from './types/cache.types'
import { Logger } from './utils/logger'

// =============================================================================
// CACHE STORE SELECTION
// =============================================================================

export function createCacheStore(): CacheStore {
  if (config.cache.driver === 'redis') {
    const client = new Redis(config.redis.url, {
      keyPrefix: config.redis.keyPrefix,
      maxRetriesPerRequest: 2
    })
    client.on('error', (error: Error) => {
      Logger.logError(error, 'Redis')
    })
    return new RedisCacheStore(client)
  }

  return new MemoryCacheStore({
    ttl: config.cache.ttl,
    maxSize: config.cache.max,
    checkPeriod: config.cache.checkPeriod
  })
}

// =============================================================================
// SERVER STARTUP
// =============================================================================

async function startServer(): Promise<void> {
  validateConfig()

  const pool = createPool({
    connectionString: config.database.url,
    maxConnections: config.database.maxConnections,
    connectionTimeoutMillis: config.database.connectionTimeout
  })
  await connectDatabase(pool)

  const db = new DatabaseService(pool)
  const cache = createCacheStore()
  const exportCache = new ExportCacheManager(db, cache, {
    exportTtl: config.cache.ttl,
    listsTtl: config.cache.listsTtl,
    strategy: config.cache.invalidation
  })
  const translations = new TranslationService(db, exportCache)
  const app = createApp({ db, cache, translations })

  const server = app.listen(config.server.port, config.server.host, () => {
    Logger.info('Server started', {
      url: `http://${config.server.host}:${config.server.port}`,
      environment: config.server.env,
      cacheDriver: cache.name,
      invalidation: exportCache.strategy,
      healthCheck: config.monitoring.healthCheck.path
    })
  })

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.syscall !== 'listen') {
      throw error
    }

    const bind = `Port ${config.server.port}`

    switch (error.code) {
      case 'EACCES':
        Logger.error(`${bind} requires elevated privileges`)
        process.exit(1)
        break
      case 'EADDRINUSE':
        Logger.error(`${bind} is already in use`)
        process.exit(1)
        break
      default:
        throw error
    }
  })

  // Graceful shutdown
  const gracefulShutdown = (signal: string) => {
    Logger.info(`Received ${signal}. Starting graceful shutdown...`)

    // Force shutdown after 30 seconds
    const forceExit = setTimeout(() => {
      Logger.error('Forced shutdown after timeout')
      process.exit(1)
    }, 30000)
    forceExit.unref()

    server.close((err) => {
      if (err) {
        Logger.logError(err, 'Server Shutdown')
        process.exit(1)
      }

      Promise.all([db.disconnect(), cache.close()])
        .then(() => {
          Logger.info('Graceful shutdown completed')
          process.exit(0)
        })
        .catch((error: unknown) => {
          Logger.error('Error during graceful shutdown', {
            error: error instanceof Error ? error.message : String(error)
          })
          process.exit(1)
        })
    })
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'))
  process.on('SIGINT', () => gracefulShutdown('SIGINT'))

  process.on('unhandledRejection', (reason: unknown) => {
    Logger.error('Unhandled Rejection', {
      reason: reason instanceof Error ? reason.message : String(reason)
    })
  })
}

// =============================================================================
// START THE SERVER
// =============================================================================

if (require.main === module) {
  startServer().catch((error: unknown) => {
    Logger.logError(error instanceof Error ? error : new Error(String(error)), 'Server Startup')
    process.exit(1)
  })
}

// =============================================================================
// EXPORTS
// =============================================================================

export { startServer }
export default startServer
