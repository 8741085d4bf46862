import type { QueryResultRow } from 'pg'

import pg from 'pg'

import type { NewTransaction, Transaction, User } from '../../domain/types'
import type { TransactionQuery, TransactionRepository } from './interfaces'

import { SCHEMA_FILE } from '../../constants'
import { toIsoDate } from '../../utils/dates'
import { readProjectFile } from '../../utils/file'
import { createLogger } from '../../utils/logger'
import { validateNewTransaction } from './validation'

const logger = createLogger('PostgresRepository')

const DATE_OID = 1082

/**
 * The part of a pg Pool or Client the repository needs
 */
export interface Queryable {
  end?(): Promise<void>
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<{ rows: R[] }>
}

interface UserRow {
  created_at: Date
  first_name: null | string
  id: string
  username: null | string
}

interface TransactionRow {
  amount: string
  category: string
  created_at: Date
  description: string
  id: number
  occurred_on: Date | string
  payment_method: null | string
  source: null | string
  user_id: string
}

const TRANSACTION_COLUMNS = 'id, user_id, description, category, source, payment_method, amount, occurred_on, created_at'

/**
 * Creates a connection pool. DATE columns are read back as yyyy-MM-dd strings
 * so calendar dates never shift with the server time zone.
 */
export function createPool(connectionString: string): pg.Pool {
  pg.types.setTypeParser(DATE_OID, (value: string) => {
    return value
  })

  return new pg.Pool({ connectionString })
}

/**
 * Transaction store backed by PostgreSQL
 */
export class PostgresTransactionRepository implements TransactionRepository {
  constructor(private readonly db: Queryable) {
    logger.debug('PostgresTransactionRepository initialized')
  }

  async ensureSchema(): Promise<void> {
    const schema = readProjectFile(SCHEMA_FILE)

    if (!schema) {
      throw new Error(`Database schema file ${SCHEMA_FILE} is missing`)
    }

    await this.db.query(schema)
    logger.info('Database schema is up to date')
  }

  async upsertUser(user: User): Promise<void> {
    await this.db.query(
      `INSERT INTO users (id, first_name, username)
       VALUES ($1, $2, $3)
       ON CONFLICT (id) DO UPDATE SET first_name = EXCLUDED.first_name, username = EXCLUDED.username`,
      [user.id, user.firstName ?? null, user.username ?? null],
    )
    logger.debug(`Upserted user ${user.id}`)
  }

  async listUsers(): Promise<User[]> {
    const { rows } = await this.db.query<UserRow>(
      'SELECT id, first_name, username, created_at FROM users ORDER BY first_name',
    )

    return rows.map((row) => {
      return {
        createdAt: row.created_at,
        firstName: row.first_name ?? undefined,
        id: String(row.id),
        username: row.username ?? undefined,
      }
    })
  }

  async addTransaction(input: NewTransaction): Promise<Transaction> {
    const checked = validateNewTransaction(input)

    // transactions.user_id references users; chats that skipped /start have no row yet
    await this.db.query(
      'INSERT INTO users (id) VALUES ($1) ON CONFLICT (id) DO NOTHING',
      [checked.userId],
    )

    const { rows } = await this.db.query<TransactionRow>(
      `INSERT INTO transactions (user_id, description, category, source, payment_method, amount, occurred_on)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${TRANSACTION_COLUMNS}`,
      [
        checked.userId,
        checked.description,
        checked.category,
        checked.source ?? null,
        checked.paymentMethod ?? null,
        checked.amount.toFixed(2),
        checked.occurredOn,
      ],
    )

    const [row] = rows
    if (!row) {
      throw new Error('Insert returned no row')
    }

    logger.debug(`Stored transaction ${row.id} for user ${row.user_id}`)

    return this.toTransaction(row)
  }

  async listTransactions(query: TransactionQuery = {}): Promise<Transaction[]> {
    const conditions: string[] = []
    const values: unknown[] = []

    if (query.userId !== undefined) {
      values.push(query.userId)
      conditions.push(`user_id = $${values.length}`)
    }

    if (query.from !== undefined) {
      values.push(query.from)
      conditions.push(`occurred_on >= $${values.length}`)
    }

    if (query.to !== undefined) {
      values.push(query.to)
      conditions.push(`occurred_on <= $${values.length}`)
    }

    if (query.kind !== undefined) {
      conditions.push(query.kind === 'income' ? 'amount > 0' : 'amount < 0')
    }

    const where = conditions.length ? ` WHERE ${conditions.join(' AND ')}` : ''
    const { rows } = await this.db.query<TransactionRow>(
      `SELECT ${TRANSACTION_COLUMNS} FROM transactions${where} ORDER BY occurred_on, id`,
      values,
    )

    return rows.map((row) => {
      return this.toTransaction(row)
    })
  }

  async checkConnection(): Promise<boolean> {
    try {
      await this.db.query('SELECT 1')

      return true
    }
    catch (error) {
      logger.error('Database connection check failed:', error)

      return false
    }
  }

  async close(): Promise<void> {
    if (this.db.end) {
      await this.db.end()
    }
  }

  private toTransaction(row: TransactionRow): Transaction {
    const transaction: Transaction = {
      amount: Number(row.amount),
      category: row.category,
      createdAt: row.created_at,
      description: row.description,
      id: row.id,
      occurredOn: typeof row.occurred_on === 'string' ? row.occurred_on : toIsoDate(row.occurred_on),
      userId: String(row.user_id),
    }

    if (row.source !== null) {
      transaction.source = row.source
    }

    if (row.payment_method !== null) {
      transaction.paymentMethod = row.payment_method
    }

    return transaction
  }
}
