// =============================================================================
// SCHEMA MIGRATION
// =============================================================================

import { readFile } from 'fs/promises'
import path from 'path'
import type { Queryable } from './client'
import { toDatabaseError } from './utils/errors'

export const SCHEMA_PATH = path.join(__dirname, '..', 'sql', 'schema.sql')

/**
 * Apply the idempotent schema script
 */
export async function migrate(db: Queryable, schemaPath: string = SCHEMA_PATH): Promise<void> {
  const sql = await readFile(schemaPath, 'utf8')
  try {
    await db.query(sql)
  } catch (error) {
    throw toDatabaseError(error, 'migrate')
  }
}
