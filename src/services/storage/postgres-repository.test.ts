import { describe, expect, it, vi } from 'vitest'

import { ValidationError } from '../../domain/errors'
import { PostgresTransactionRepository } from './postgres-repository'

const COLUMNS = 'id, user_id, description, category, source, payment_method, amount, occurred_on, created_at'

function createDb(rows: unknown[] = []) {
  return {
    end: vi.fn().mockResolvedValue(undefined),
    query: vi.fn().mockResolvedValue({ rows }),
  }
}

const createdAt = new Date(2024, 5, 3, 12)

const lunchRow = {
  amount: '-12.50',
  category: 'Food',
  created_at: createdAt,
  description: 'Lunch',
  id: 7,
  occurred_on: '2024-06-03',
  payment_method: 'Cash',
  source: null,
  user_id: '101',
}

describe('PostgresTransactionRepository', () => {
  it('builds a parameterised filter', async () => {
    const db = createDb()
    const repository = new PostgresTransactionRepository(db)

    await repository.listTransactions({ from: '2024-01-01', kind: 'expense', userId: '101' })

    expect(db.query).toHaveBeenCalledWith(
      `SELECT ${COLUMNS} FROM transactions WHERE user_id = $1 AND occurred_on >= $2 AND amount < 0 ORDER BY occurred_on, id`,
      ['101', '2024-01-01'],
    )
  })

  it('lists everything without a filter', async () => {
    const db = createDb()
    const repository = new PostgresTransactionRepository(db)

    await repository.listTransactions({ kind: 'income', to: '2024-12-31' })
    await repository.listTransactions()

    expect(db.query).toHaveBeenNthCalledWith(
      1,
      `SELECT ${COLUMNS} FROM transactions WHERE occurred_on <= $1 AND amount > 0 ORDER BY occurred_on, id`,
      ['2024-12-31'],
    )
    expect(db.query).toHaveBeenNthCalledWith(2, `SELECT ${COLUMNS} FROM transactions ORDER BY occurred_on, id`, [])
  })

  it('maps rows to transactions', async () => {
    const db = createDb([lunchRow, { ...lunchRow, id: 8, occurred_on: new Date(2024, 5, 4) }])
    const repository = new PostgresTransactionRepository(db)

    const [lunch, next] = await repository.listTransactions()

    expect(lunch).toEqual({
      amount: -12.5,
      category: 'Food',
      createdAt,
      description: 'Lunch',
      id: 7,
      occurredOn: '2024-06-03',
      paymentMethod: 'Cash',
      userId: '101',
    })
    expect(lunch).not.toHaveProperty('source')
    expect(next?.occurredOn).toBe('2024-06-04')
  })

  it('inserts validated transactions with a fixed-point amount', async () => {
    const db = createDb([lunchRow])
    const repository = new PostgresTransactionRepository(db)

    const stored = await repository.addTransaction({
      amount: -12.5,
      category: 'Food',
      description: ' Lunch ',
      occurredOn: '2024-06-03',
      paymentMethod: 'Cash',
      userId: '101',
    })

    expect(db.query).toHaveBeenCalledTimes(2)
    expect(db.query.mock.calls[1]?.[1]).toEqual(['101', 'Lunch', 'Food', null, 'Cash', '-12.50', '2024-06-03'])
    expect(stored.id).toBe(7)
  })

  it('registers the user before inserting its transaction', async () => {
    const db = createDb([lunchRow])
    const repository = new PostgresTransactionRepository(db)

    await repository.addTransaction({
      amount: -12.5,
      category: 'Food',
      description: 'Lunch',
      occurredOn: '2024-06-03',
      userId: '101',
    })

    expect(db.query).toHaveBeenNthCalledWith(1, 'INSERT INTO users (id) VALUES ($1) ON CONFLICT (id) DO NOTHING', ['101'])
    expect(String(db.query.mock.calls[1]?.[0])).toContain('INSERT INTO transactions')
  })

  it('does not touch the database for invalid input', async () => {
    const db = createDb()
    const repository = new PostgresTransactionRepository(db)

    await expect(repository.addTransaction({
      amount: 10_000_000_000,
      category: 'Food',
      description: 'Lunch',
      occurredOn: '2024-06-03',
      userId: '101',
    })).rejects.toBeInstanceOf(ValidationError)
    expect(db.query).not.toHaveBeenCalled()
  })

  it('upserts users with nulls for missing names', async () => {
    const db = createDb()
    const repository = new PostgresTransactionRepository(db)

    await repository.upsertUser({ id: '101' })

    expect(db.query.mock.calls[0]?.[1]).toEqual(['101', null, null])
  })

  it('maps user rows', async () => {
    const db = createDb([{ created_at: createdAt, first_name: 'Ana', id: '101', username: null }])
    const repository = new PostgresTransactionRepository(db)

    await expect(repository.listUsers()).resolves.toEqual([
      { createdAt, firstName: 'Ana', id: '101', username: undefined },
    ])
  })

  it('creates the schema from the SQL file', async () => {
    const db = createDb()
    const repository = new PostgresTransactionRepository(db)

    await repository.ensureSchema()

    expect(String(db.query.mock.calls[0]?.[0])).toContain('CREATE TABLE IF NOT EXISTS transactions')
  })

  it('reports an unreachable database', async () => {
    const db = createDb()
    db.query.mockRejectedValueOnce(new Error('connection refused'))
    const repository = new PostgresTransactionRepository(db)

    await expect(repository.checkConnection()).resolves.toBe(false)
    await expect(repository.checkConnection()).resolves.toBe(true)
  })

  it('closes the pool', async () => {
    const db = createDb()
    const repository = new PostgresTransactionRepository(db)

    await repository.close()

    expect(db.end).toHaveBeenCalledTimes(1)
  })
})
