import type { NewTransaction, Transaction, User } from '../../domain/types'
import type { TransactionQuery, TransactionRepository } from './interfaces'

import { createLogger } from '../../utils/logger'
import { isWithinRange } from '../analytics/aggregation'
import { kindOf } from '../analytics/insights'
import { validateNewTransaction } from './validation'

const logger = createLogger('MemoryRepository')

/**
 * Keeps users and transactions in process memory.
 * Used when no database is configured, and as the store in tests.
 */
export class MemoryTransactionRepository implements TransactionRepository {
  private nextId = 1
  private readonly transactions: Transaction[] = []
  private readonly users = new Map<string, User>()

  constructor(private readonly clock: () => Date = () => {
    return new Date()
  }) {
    logger.debug('MemoryTransactionRepository initialized')
  }

  async ensureSchema(): Promise<void> {
    // Nothing to create
  }

  async upsertUser(user: User): Promise<void> {
    const existing = this.users.get(user.id)

    this.users.set(user.id, {
      createdAt: existing?.createdAt ?? this.clock(),
      firstName: user.firstName,
      id: user.id,
      username: user.username,
    })
    logger.debug(existing ? `Updated user ${user.id}` : `Registered user ${user.id}`)
  }

  async listUsers(): Promise<User[]> {
    return [...this.users.values()].sort((a, b) => {
      return (a.firstName ?? '').localeCompare(b.firstName ?? '')
    })
  }

  async addTransaction(input: NewTransaction): Promise<Transaction> {
    const now = this.clock()
    const checked = validateNewTransaction(input, now)

    if (!this.users.has(checked.userId)) {
      this.users.set(checked.userId, { createdAt: now, id: checked.userId })
      logger.debug(`Registered user ${checked.userId} on first transaction`)
    }

    const transaction: Transaction = {
      ...checked,
      createdAt: now,
      id: this.nextId++,
    }
    this.transactions.push(transaction)
    logger.debug(`Stored transaction ${transaction.id} for user ${transaction.userId}`)

    return { ...transaction }
  }

  async listTransactions(query: TransactionQuery = {}): Promise<Transaction[]> {
    return this.transactions
      .filter((t) => {
        return (query.userId === undefined || t.userId === query.userId)
          && (query.kind === undefined || kindOf(t) === query.kind)
          && isWithinRange(t.occurredOn, query)
      })
      .sort((a, b) => {
        return a.occurredOn.localeCompare(b.occurredOn) || a.id - b.id
      })
      .map((t) => {
        return { ...t }
      })
  }

  async checkConnection(): Promise<boolean> {
    return true
  }

  async close(): Promise<void> {
    logger.debug('MemoryTransactionRepository closed')
  }
}
