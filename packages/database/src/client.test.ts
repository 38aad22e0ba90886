import { describe, it, expect } from 'vitest'
import { withTransaction, type SqlResult, type TransactionClient, type TransactionSource } from './client'
import { ConflictError, StoreUnavailableError } from './utils/errors'

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code })
}

class RecordingClient implements TransactionClient {
  readonly statements: string[] = []
  readonly releases: Array<Error | boolean | undefined> = []
  readonly failures = new Map<string, Error>()

  async query(text: string): Promise<SqlResult> {
    this.statements.push(text)
    const failure = this.failures.get(text)
    if (failure) {
      throw failure
    }
    return { rows: [], rowCount: 0 }
  }

  release(error?: Error | boolean): void {
    this.releases.push(error)
  }
}

function sourceOf(client: TransactionClient): TransactionSource {
  return { connect: async () => client }
}

describe('withTransaction', () => {
  it('commits and releases the client on success', async () => {
    const client = new RecordingClient()

    const result = await withTransaction(sourceOf(client), async (db) => {
      await db.query('INSERT INTO tags (name) VALUES ($1)', ['web'])
      return 'done'
    })

    expect(result).toBe('done')
    expect(client.statements).toEqual(['BEGIN', 'INSERT INTO tags (name) VALUES ($1)', 'COMMIT'])
    expect(client.releases).toEqual([undefined])
  })

  it('rolls back and rethrows errors from the callback unchanged', async () => {
    const client = new RecordingClient()
    const failure = Object.assign(new Error('Translation not found'), { code: 'NOT_FOUND' })

    await expect(
      withTransaction(sourceOf(client), async () => {
        throw failure
      })
    ).rejects.toBe(failure)

    expect(client.statements).toEqual(['BEGIN', 'ROLLBACK'])
    expect(client.releases).toEqual([undefined])
  })

  it('maps driver errors raised inside the transaction', async () => {
    const client = new RecordingClient()
    client.failures.set('INSERT dup', pgError('duplicate key value', '23505'))

    await expect(
      withTransaction(sourceOf(client), async (db) => db.query('INSERT dup'))
    ).rejects.toBeInstanceOf(ConflictError)

    expect(client.statements).toEqual(['BEGIN', 'INSERT dup', 'ROLLBACK'])
  })

  it('discards a client that cannot roll back', async () => {
    const client = new RecordingClient()
    const rollbackFailure = pgError('connection lost', '08006')
    client.failures.set('ROLLBACK', rollbackFailure)
    const failure = new Error('sync failed')

    await expect(
      withTransaction(sourceOf(client), async () => {
        throw failure
      })
    ).rejects.toBe(failure)

    expect(client.releases).toEqual([rollbackFailure])
  })

  it('reports an unreachable database as unavailable', async () => {
    const source: TransactionSource = {
      connect: async () => {
        throw pgError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED')
      },
    }

    await expect(withTransaction(source, async () => 'never')).rejects.toBeInstanceOf(StoreUnavailableError)
  })
})
