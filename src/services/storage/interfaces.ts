// services/storage/interfaces.ts
import type { DateRange, NewTransaction, Transaction, TransactionKind, User } from '../../domain/types'

export interface TransactionQuery extends DateRange {
  kind?: TransactionKind
  userId?: string
}

export interface TransactionRepository {
  /**
   * Creates the tables if they do not exist yet
   */
  ensureSchema: () => Promise<void>

  /**
   * Registers a user, or refreshes the name of a known one
   */
  upsertUser: (user: User) => Promise<void>

  /**
   * All registered users, ordered by first name
   */
  listUsers: () => Promise<User[]>

  /**
   * Validates and stores a transaction, registering its user when unknown
   * @throws ValidationError before anything is written
   */
  addTransaction: (transaction: NewTransaction) => Promise<Transaction>

  /**
   * Transactions matching the query, oldest first
   */
  listTransactions: (query?: TransactionQuery) => Promise<Transaction[]>

  /**
   * Checks that the store is reachable
   */
  checkConnection: () => Promise<boolean>

  close: () => Promise<void>
}
