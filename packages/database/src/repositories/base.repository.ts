// =============================================================================
// BASE REPOSITORY - POSTGRESQL
// =============================================================================
// High-level abstraction for database operations with comprehensive error handling

import type { QueryResultRow } from 'pg'
import type { Queryable, SqlResult } from '../client'
import { NotFoundError, toDatabaseError } from '../utils/errors'

export abstract class BaseRepository<T> {
  protected abstract readonly modelName: string
  protected abstract readonly tableName: string

  constructor(protected readonly db: Queryable) {}

  /**
   * Map a raw row onto the entity type
   */
  protected abstract toEntity(row: QueryResultRow): T

  /**
   * Convert driver errors to the database error taxonomy
   */
  protected handleError(error: unknown, operation: string): never {
    throw toDatabaseError(error, operation, this.modelName)
  }

  protected async execute(text: string, values: unknown[], operation: string): Promise<SqlResult> {
    try {
      return await this.db.query(text, values)
    } catch (error) {
      this.handleError(error, operation)
    }
  }

  protected async executeMany(text: string, values: unknown[], operation: string): Promise<T[]> {
    const result = await this.execute(text, values, operation)
    return result.rows.map((row) => this.toEntity(row))
  }

  protected async executeOne(text: string, values: unknown[], operation: string): Promise<T | null> {
    const result = await this.execute(text, values, operation)
    const [row] = result.rows
    return row ? this.toEntity(row) : null
  }

  /**
   * Find a record by ID
   */
  async findById(id: number): Promise<T | null> {
    return this.executeOne(`SELECT * FROM ${this.tableName} WHERE id = $1`, [id], 'findById')
  }

  /**
   * Find a record by ID or throw error
   */
  async findByIdOrThrow(id: number): Promise<T> {
    const record = await this.findById(id)
    if (!record) {
      throw new NotFoundError(this.modelName, id)
    }
    return record
  }

  /**
   * Count records
   */
  async count(): Promise<number> {
    const result = await this.execute(`SELECT COUNT(*)::int AS total FROM ${this.tableName}`, [], 'count')
    const [row] = result.rows
    return row ? Number(row.total) : 0
  }

  /**
   * Delete a record by ID, returning the removed row
   */
  async delete(id: number): Promise<T> {
    const record = await this.executeOne(`DELETE FROM ${this.tableName} WHERE id = $1 RETURNING *`, [id], 'delete')
    if (!record) {
      throw new NotFoundError(this.modelName, id)
    }
    return record
  }
}
