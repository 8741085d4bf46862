import './env'

import process from 'node:process'

import type { AppConfig } from './config/types'

import { FinanceBotFactory } from './bot'
import { loadConfig } from './config/load'
import { DashboardApi } from './dashboard/api'
import { startDashboardServer, stopDashboardServer } from './dashboard/server'
import { logger } from './utils/logger'

/**
 * Main function to start the dashboard and the bot
 */
async function startApp() {
  logger.info('Starting finance bot and dashboard')

  let config: AppConfig
  try {
    config = loadConfig(process.env)
  }
  catch (error) {
    logger.fatal(error instanceof Error ? error.message : String(error))
    process.exit(1)
  }

  logger.debug('Configuration loaded', {
    currency: config.currency,
    dashboardPort: config.dashboard.port,
    debug: config.debug,
    hasDatabase: Boolean(config.databaseUrl),
  })

  const repository = await FinanceBotFactory.createRepository(config)
  const api = new DashboardApi(repository, { currency: config.currency, locale: config.locale })
  const server = await startDashboardServer(api, config.dashboard.port)

  const bot = FinanceBotFactory.createBot(config, repository)
  await bot.start()

  logger.info('Bot successfully started')

  // Handle process termination
  const handleExit = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`)
    bot.stop(signal)

    Promise.all([stopDashboardServer(server), repository.close()])
      .then(() => {
        process.exit(0)
      })
      .catch((error: unknown) => {
        logger.error('Error during shutdown:', error)
        process.exit(1)
      })
  }

  process.once('SIGINT', handleExit)
  process.once('SIGTERM', handleExit)
}

// Start the application
startApp()
  .catch((error) => {
    logger.fatal('Unhandled error during startup:', error)
    process.exit(1)
  })
