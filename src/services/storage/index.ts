export type { TransactionQuery, TransactionRepository } from './interfaces'
export { MemoryTransactionRepository } from './memory-repository'
export { createPool, PostgresTransactionRepository } from './postgres-repository'
export type { Queryable } from './postgres-repository'
export { validateNewTransaction } from './validation'
