import { Pool, type PoolClient, type QueryResultRow } from 'pg'
import { isDriverError, toDatabaseError } from './utils/errors'

// =============================================================================
// POSTGRES POOL CONFIGURATION
// =============================================================================

export interface DatabaseClientOptions {
  connectionString: string
  maxConnections?: number
  connectionTimeoutMillis?: number
  idleTimeoutMillis?: number
}

/**
 * Minimal query surface shared by the pool, a checked-out client and test stubs
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<SqlResult>
}

export interface SqlResult {
  rows: QueryResultRow[]
  rowCount: number | null
}

export function createPool(options: DatabaseClientOptions): Pool {
  return new Pool({
    connectionString: options.connectionString,
    max: options.maxConnections ?? 10,
    connectionTimeoutMillis: options.connectionTimeoutMillis ?? 60000,
    idleTimeoutMillis: options.idleTimeoutMillis ?? 30000,
  })
}

export function poolQueryable(pool: Pool): Queryable {
  return {
    query: (text, values = []) => pool.query(text, values),
  }
}

/**
 * A checked-out connection: queries plus the release back to its pool
 */
export interface TransactionClient extends Queryable {
  release(error?: Error | boolean): void
}

export interface TransactionSource {
  connect(): Promise<TransactionClient>
}

export function clientQueryable(client: PoolClient): TransactionClient {
  return {
    query: (text, values = []) => client.query(text, values),
    release: (error) => client.release(error),
  }
}

export function poolTransactionSource(pool: Pool): TransactionSource {
  return {
    connect: async () => clientQueryable(await pool.connect()),
  }
}

// =============================================================================
// DATABASE CONNECTION UTILITIES
// =============================================================================

export async function connectDatabase(pool: Pool): Promise<void> {
  try {
    const client = await pool.connect()
    client.release()
  } catch (error) {
    throw toDatabaseError(error, 'connect')
  }
}

export async function disconnectDatabase(pool: Pool): Promise<void> {
  await pool.end()
}

// =============================================================================
// TRANSACTION UTILITIES
// =============================================================================

/**
 * Run `callback` on a dedicated client between BEGIN and COMMIT. Any failure
 * rolls back; driver errors are rethrown as database errors and anything else
 * the callback throws is rethrown unchanged.
 */
export async function withTransaction<T>(
  source: TransactionSource,
  callback: (client: Queryable) => Promise<T>
): Promise<T> {
  let client: TransactionClient
  try {
    client = await source.connect()
  } catch (error) {
    throw toDatabaseError(error, 'transaction')
  }

  try {
    await client.query('BEGIN')
    const result = await callback(client)
    await client.query('COMMIT')
    client.release()
    return result
  } catch (error) {
    try {
      await client.query('ROLLBACK')
      client.release()
    } catch (rollbackError) {
      // A client that failed to roll back must not return to the pool
      client.release(rollbackError instanceof Error ? rollbackError : true)
    }
    throw isDriverError(error) ? toDatabaseError(error, 'transaction') : error
  }
}
