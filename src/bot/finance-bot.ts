import type { Context, NarrowedContext } from 'telegraf'
import type { Message, Update } from 'telegraf/types'

import process from 'node:process'
import { Telegraf } from 'telegraf'
import { message } from 'telegraf/filters'

import type { AppConfig } from '../config/types'
import type { ConversationManager } from '../services/conversation/interfaces'
import type { TransactionRepository } from '../services/storage/interfaces'
import type { BotReply } from './types'

import { CONVERSATION_CLEANUP_INTERVAL_MS } from '../constants'
import { Command } from '../constants/types'
import { createLogger } from '../utils/logger'
import { EntryWizard } from './entry-wizard'
import { ReportBuilder } from './report-builder'
import { sendReply } from './reply-sender'
import { UIFormatter } from './ui-formatter'

const logger = createLogger('FinanceBot')

const COMMAND_DESCRIPTIONS: Array<{ command: string, description: string }> = [
  { command: Command.INCOME, description: 'Record an income' },
  { command: Command.EXPENSE, description: 'Record an expense' },
  { command: Command.LIST_INCOME, description: 'List the income of a month' },
  { command: Command.LIST_EXPENSE, description: 'List the expenses of a month' },
  { command: Command.SUMMARY, description: 'This month and all-time totals' },
  { command: Command.DASHBOARD, description: 'Link to the dashboard' },
  { command: Command.CANCEL, description: 'Cancel the current operation' },
]

export class FinanceBot {
  private bot: Telegraf
  private cleanupTimer?: NodeJS.Timeout
  private config: AppConfig
  private conversationManager: ConversationManager
  private entryWizard: EntryWizard
  private reportBuilder: ReportBuilder
  private repository: TransactionRepository
  private uiFormatter: UIFormatter

  constructor(
    config: AppConfig,
    repository: TransactionRepository,
    conversationManager: ConversationManager,
  ) {
    this.config = config
    this.repository = repository
    this.conversationManager = conversationManager
    this.bot = new Telegraf(config.telegramToken)

    this.uiFormatter = new UIFormatter(config.currency, config.locale)
    this.entryWizard = new EntryWizard(this.conversationManager, this.repository, this.uiFormatter)
    this.reportBuilder = new ReportBuilder(this.repository, this.uiFormatter)

    this.setupHandlers()
  }

  // Setup message handlers
  private setupHandlers(): void {
    this.bot.command(Command.START, this.handleStartCommand.bind(this))
    this.bot.command(Command.CANCEL, this.handleCancelCommand.bind(this))

    this.bot.command(Command.INCOME, async (ctx) => {
      await this.sendReply(ctx, this.entryWizard.begin(this.getUserId(ctx), 'income'))
    })
    this.bot.command(Command.EXPENSE, async (ctx) => {
      await this.sendReply(ctx, this.entryWizard.begin(this.getUserId(ctx), 'expense'))
    })
    this.bot.command(Command.LIST_INCOME, async (ctx) => {
      await this.sendReply(ctx, this.entryWizard.beginQuery(this.getUserId(ctx), 'income'))
    })
    this.bot.command(Command.LIST_EXPENSE, async (ctx) => {
      await this.sendReply(ctx, this.entryWizard.beginQuery(this.getUserId(ctx), 'expense'))
    })

    this.bot.command(Command.SUMMARY, this.handleSummaryCommand.bind(this))
    this.bot.command(Command.DASHBOARD, this.handleDashboardCommand.bind(this))

    // Wizard answers
    this.bot.on(message('text'), this.handleTextMessage.bind(this))

    this.bot.catch(async (error, ctx) => {
      await this.handleError(ctx, error)
    })
  }

  // Start the bot
  public async start(): Promise<void> {
    try {
      await this.bot.telegram.setMyCommands(COMMAND_DESCRIPTIONS)
    }
    catch (error) {
      logger.warn('Could not register the command menu:', error)
    }

    // Periodic cleanup of abandoned dialogs
    this.cleanupTimer = setInterval(() => {
      this.conversationManager.cleanupOldConversations()
    }, CONVERSATION_CLEANUP_INTERVAL_MS)

    // Resolves only once polling stops
    this.bot.launch().catch((error: unknown) => {
      logger.fatal('Bot polling stopped with an error:', error)
      process.exitCode = 1
    })
  }

  // Stop the bot
  public stop(reason?: string): void {
    clearInterval(this.cleanupTimer)
    this.bot.stop(reason)
  }

  // Helper methods
  private getUserId(ctx: Context): string {
    return ctx.from?.id.toString() || ''
  }

  private async sendReply(ctx: Context, reply: BotReply): Promise<void> {
    await sendReply(ctx, reply, this.uiFormatter)
  }

  // Message handlers
  private async handleStartCommand(ctx: Context): Promise<void> {
    const userId = this.getUserId(ctx)
    this.conversationManager.resetConversation(userId)

    try {
      await this.repository.upsertUser({
        firstName: ctx.from?.first_name,
        id: userId,
        username: ctx.from?.username,
      })
    }
    catch (error) {
      // Registration failing must not block the menu
      logger.error(`Error registering user ${userId}:`, error)
    }

    await this.sendReply(ctx, {
      keyboard: this.uiFormatter.getMainMenuKeyboard(),
      text: '👋 Hello! What would you like to record?',
    })
  }

  private async handleCancelCommand(ctx: Context): Promise<void> {
    await this.sendReply(ctx, this.entryWizard.cancel(this.getUserId(ctx)))
  }

  private async handleSummaryCommand(ctx: Context): Promise<void> {
    const userId = this.getUserId(ctx)
    const text = await this.reportBuilder.buildSummary(userId)

    await this.sendReply(ctx, { text })
  }

  private async handleDashboardCommand(ctx: Context): Promise<void> {
    const text = this.uiFormatter.formatDashboardLink(this.config.dashboard.publicUrl, this.getUserId(ctx))

    await this.sendReply(ctx, { text })
  }

  private async handleTextMessage(
    ctx: NarrowedContext<Context, Update.MessageUpdate<Message.TextMessage>>,
  ): Promise<void> {
    const userId = this.getUserId(ctx)
    const text = ctx.message.text || ''

    if (text.startsWith('/')) {
      await this.sendReply(ctx, {
        keyboard: this.uiFormatter.getMainMenuKeyboard(),
        text: 'Unknown command. Use the menu below.',
      })

      return
    }

    const reply = await this.entryWizard.handleText(userId, text)

    await this.sendReply(ctx, reply ?? {
      keyboard: this.uiFormatter.getMainMenuKeyboard(),
      text: 'Use /income or /expense to record a transaction.',
    })
  }

  private async handleError(ctx: Context, error: unknown): Promise<void> {
    const userId = this.getUserId(ctx)
    logger.error(`Error handling update for user ${userId}:`, error)

    if (userId) {
      this.conversationManager.resetConversation(userId)
    }

    try {
      await ctx.reply('❌ Something went wrong. Please try again later.')
    }
    catch (replyError) {
      logger.error('Failed to send error reply to user:', replyError)
    }
  }
}
