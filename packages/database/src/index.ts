// =============================================================================
// DATABASE PACKAGE - MAIN EXPORTS
// =============================================================================
// PostgreSQL access layer for the translation catalog, built on node-postgres

import type { Pool } from 'pg'
import { poolQueryable, poolTransactionSource, withTransaction, type Queryable, type TransactionSource } from './client'
import { TagRepository } from './repositories/tag.repository'
import { TranslationRepository } from './repositories/translation.repository'
import type { CatalogDatabase, CatalogRepositories, DatabaseHealth } from './types'

export * from './client'
export * from './types'
export * from './query'
export * from './utils/errors'
export { migrate, SCHEMA_PATH } from './migrate'

// Export all repositories
export * from './repositories'

/**
 * Create all repositories over one connection
 */
export function createRepositories(db: Queryable): CatalogRepositories {
  const tag = new TagRepository(db)
  return {
    tag,
    translation: new TranslationRepository(db, tag),
  }
}

/**
 * Database service class that provides access to all repositories
 */
export class DatabaseService implements CatalogDatabase {
  public readonly repositories: CatalogRepositories
  private readonly connections: TransactionSource

  constructor(private pool: Pool) {
    this.repositories = createRepositories(poolQueryable(pool))
    this.connections = poolTransactionSource(pool)
  }

  /**
   * Execute a transaction; repositories handed to `fn` share one connection
   */
  async transaction<T>(fn: (repositories: CatalogRepositories) => Promise<T>): Promise<T> {
    return withTransaction(this.connections, (client) => fn(createRepositories(client)))
  }

  /**
   * Disconnect from the database
   */
  async disconnect(): Promise<void> {
    await this.pool.end()
  }

  /**
   * Check database health
   */
  async healthCheck(): Promise<DatabaseHealth> {
    const start = Date.now()
    try {
      await this.pool.query('SELECT 1')
      return { status: 'healthy', latency: Date.now() - start }
    } catch (error) {
      return { status: 'unhealthy', error: error instanceof Error ? error.message : String(error) }
    }
  }
}

// Default export for convenience
export default DatabaseService
