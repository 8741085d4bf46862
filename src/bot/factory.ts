// bot/factory.ts

import type { AppConfig } from '../config/types'
import type { TransactionRepository } from '../services/storage/interfaces'

import { MemoryConversationManager } from '../services/conversation/manager'
import { createPool, MemoryTransactionRepository, PostgresTransactionRepository } from '../services/storage'
import { createLogger } from '../utils/logger'
import { FinanceBot } from './finance-bot'

const logger = createLogger('FinanceBotFactory')

export class FinanceBotFactory {
  static createBot(config: AppConfig, repository: TransactionRepository): FinanceBot {
    return new FinanceBot(config, repository, new MemoryConversationManager())
  }

  /**
   * PostgreSQL when a connection string is configured, process memory otherwise
   */
  static async createRepository(config: AppConfig): Promise<TransactionRepository> {
    if (!config.databaseUrl) {
      logger.warn('DATABASE_URL is not set, transactions will be kept in memory only')

      return new MemoryTransactionRepository()
    }

    const repository = new PostgresTransactionRepository(createPool(config.databaseUrl))

    if (!await repository.checkConnection()) {
      await repository.close()
      throw new Error('Could not connect to the database')
    }

    await repository.ensureSchema()

    return repository
  }
}
