import type { NewTransaction, TransactionKind } from '../domain/types'
import type { ConversationManager, TransactionDraft } from '../services/conversation/interfaces'
import type { TransactionRepository } from '../services/storage/interfaces'
import type { BotReply } from './types'
import type { UIFormatter } from './ui-formatter'

import { CATEGORIES, INCOME_SOURCES, PAYMENT_METHODS, STATUS_MAP } from '../constants'
import { DateChoice } from '../constants/types'
import { ValidationError } from '../domain/errors'
import { isFutureDate, monthRange, parseDisplayDate, todayIso } from '../utils/dates'
import { createLogger } from '../utils/logger'
import { isKeyboardOption, parseAmount, parseMonthName } from './input-parser'

const logger = createLogger('EntryWizard')

/**
 * Step-by-step dialog that records an income or expense,
 * and the month query that lists them back.
 */
export class EntryWizard {
  constructor(
    private readonly conversationManager: ConversationManager,
    private readonly repository: TransactionRepository,
    private readonly uiFormatter: UIFormatter,
    private readonly clock: () => Date = () => {
      return new Date()
    },
  ) {}

  public begin(userId: string, kind: TransactionKind): BotReply {
    this.conversationManager.startEntry(userId, kind)

    return {
      removeKeyboard: true,
      text: kind === 'income'
        ? '📥 Let\'s record an income!\n\nFirst, what is the description?'
        : '📤 Let\'s record an expense!\n\nFirst, what is the description?',
    }
  }

  public beginQuery(userId: string, kind: TransactionKind): BotReply {
    this.conversationManager.startQuery(userId, kind)

    return {
      keyboard: this.uiFormatter.getMonthKeyboard(),
      text: `📅 Which month of ${kind === 'income' ? 'income' : 'expenses'} do you want to see?`,
    }
  }

  public cancel(userId: string): BotReply {
    this.conversationManager.resetConversation(userId)

    return { keyboard: this.uiFormatter.getMainMenuKeyboard(), text: '❌ Operation cancelled.' }
  }

  /**
   * Feeds a text answer to the current step
   * @returns The reply, or undefined when no dialog is in progress
   */
  public async handleText(userId: string, text: string): Promise<BotReply | undefined> {
    const conversation = this.conversationManager.getOrCreateConversation(userId)
    const { draft } = conversation
    const answer = text.trim()

    switch (conversation.status) {
      case STATUS_MAP.AWAITING_DESCRIPTION:
        return this.handleDescription(userId, draft, answer)
      case STATUS_MAP.AWAITING_CATEGORY:
        return this.handleCategory(userId, draft, answer)
      case STATUS_MAP.AWAITING_SOURCE:
        return this.handleSource(userId, answer)
      case STATUS_MAP.AWAITING_PAYMENT_METHOD:
        return this.handlePaymentMethod(userId, answer)
      case STATUS_MAP.AWAITING_AMOUNT:
        return this.handleAmount(userId, answer)
      case STATUS_MAP.AWAITING_DATE:
        return this.handleDateChoice(userId, answer)
      case STATUS_MAP.AWAITING_MANUAL_DATE:
        return this.handleManualDate(userId, answer)
      case STATUS_MAP.AWAITING_QUERY_MONTH:
        return this.handleQueryMonth(userId, conversation.queryKind ?? 'expense', answer)
      default:
        return undefined
    }
  }

  private handleDescription(userId: string, draft: TransactionDraft, answer: string): BotReply {
    if (!answer) {
      return { text: '⚠️ The description cannot be empty. What is the description?' }
    }

    const kind = draft.kind ?? 'expense'
    this.conversationManager.updateDraft(userId, { description: answer })
    this.conversationManager.updateStatus(userId, STATUS_MAP.AWAITING_CATEGORY)

    return { keyboard: this.uiFormatter.getCategoryKeyboard(kind), text: '🗂 Choose the category:' }
  }

  private handleCategory(userId: string, draft: TransactionDraft, answer: string): BotReply {
    const kind = draft.kind ?? 'expense'

    if (!isKeyboardOption(CATEGORIES[kind], answer)) {
      return { keyboard: this.uiFormatter.getCategoryKeyboard(kind), text: '⚠️ Invalid category! Use the buttons.' }
    }

    this.conversationManager.updateDraft(userId, { category: answer })

    if (kind === 'income') {
      this.conversationManager.updateStatus(userId, STATUS_MAP.AWAITING_SOURCE)

      return { keyboard: this.uiFormatter.getSourceKeyboard(), text: '🏦 What is the source of this income?' }
    }

    this.conversationManager.updateStatus(userId, STATUS_MAP.AWAITING_PAYMENT_METHOD)

    return { keyboard: this.uiFormatter.getPaymentMethodKeyboard(), text: '💳 What was the payment method?' }
  }

  private handleSource(userId: string, answer: string): BotReply {
    if (!isKeyboardOption(INCOME_SOURCES, answer)) {
      return { keyboard: this.uiFormatter.getSourceKeyboard(), text: '⚠️ Invalid source! Use the buttons.' }
    }

    this.conversationManager.updateDraft(userId, { source: answer })

    return this.askAmount(userId, '1500.50')
  }

  private handlePaymentMethod(userId: string, answer: string): BotReply {
    if (!isKeyboardOption(PAYMENT_METHODS, answer)) {
      return { keyboard: this.uiFormatter.getPaymentMethodKeyboard(), text: '⚠️ Invalid payment method! Use the buttons.' }
    }

    this.conversationManager.updateDraft(userId, { paymentMethod: answer })

    return this.askAmount(userId, '150.75')
  }

  private askAmount(userId: string, example: string): BotReply {
    this.conversationManager.updateStatus(userId, STATUS_MAP.AWAITING_AMOUNT)

    return { keyboard: this.uiFormatter.getCancelKeyboard(), text: `💰 What is the amount? (e.g. ${example})` }
  }

  private handleAmount(userId: string, answer: string): BotReply {
    const amount = parseAmount(answer)

    if (amount === undefined) {
      return { text: '⚠️ Invalid amount! Enter a positive number (e.g. 1234.56 or 1234,56).' }
    }

    this.conversationManager.updateDraft(userId, { amount })
    this.conversationManager.updateStatus(userId, STATUS_MAP.AWAITING_DATE)

    return { keyboard: this.uiFormatter.getDateKeyboard(), text: '📅 Transaction date:' }
  }

  private async handleDateChoice(userId: string, answer: string): Promise<BotReply> {
    if (answer === DateChoice.TODAY) {
      return this.save(userId, todayIso(this.clock()))
    }

    if (answer === DateChoice.OTHER) {
      this.conversationManager.updateStatus(userId, STATUS_MAP.AWAITING_MANUAL_DATE)

      return { keyboard: this.uiFormatter.getCancelKeyboard(), text: '📅 Enter the date (DD/MM/YYYY):' }
    }

    return this.handleManualDate(userId, answer)
  }

  private async handleManualDate(userId: string, answer: string): Promise<BotReply> {
    const occurredOn = parseDisplayDate(answer)

    if (!occurredOn) {
      return { text: '⚠️ Invalid format! Use DD/MM/YYYY' }
    }

    if (isFutureDate(occurredOn, this.clock())) {
      return { text: '⚠️ Future date! Use a valid date.' }
    }

    return this.save(userId, occurredOn)
  }

  private async save(userId: string, occurredOn: string): Promise<BotReply> {
    const draft = this.conversationManager.updateDraft(userId, { occurredOn })
    const menu = this.uiFormatter.getMainMenuKeyboard()

    try {
      await this.repository.addTransaction(this.toNewTransaction(userId, draft, occurredOn))
      logger.info(`Saved ${draft.kind} for user ${userId}`)

      return { keyboard: menu, text: '✅ Record saved successfully!' }
    }
    catch (error) {
      if (error instanceof ValidationError) {
        logger.warn(`Rejected ${draft.kind} for user ${userId}: ${error.message}`)

        return { keyboard: menu, text: `⚠️ ${error.message}` }
      }

      logger.error(`Error saving transaction for user ${userId}:`, error)

      return { keyboard: menu, text: '❌ Error saving! Please try again.' }
    }
    finally {
      this.conversationManager.resetConversation(userId)
    }
  }

  private toNewTransaction(userId: string, draft: TransactionDraft, occurredOn: string): NewTransaction {
    const { amount, category, description, kind } = draft

    if (amount === undefined || !category || !description || !kind) {
      throw new Error('The entry dialog ended with missing answers')
    }

    return {
      amount: kind === 'income' ? amount : -amount,
      category,
      description,
      occurredOn,
      paymentMethod: kind === 'expense' ? draft.paymentMethod : undefined,
      source: kind === 'income' ? draft.source : undefined,
      userId,
    }
  }

  private async handleQueryMonth(userId: string, kind: TransactionKind, answer: string): Promise<BotReply> {
    const month = parseMonthName(answer)

    if (month === undefined) {
      return { keyboard: this.uiFormatter.getMonthKeyboard(), text: '⚠️ Invalid month! Use the buttons.' }
    }

    const year = this.clock().getFullYear()
    this.conversationManager.resetConversation(userId)

    const transactions = await this.repository.listTransactions({
      ...monthRange(year, month),
      kind,
      userId,
    })
    logger.debug(`Listing ${transactions.length} ${kind} records of ${year}-${month} for user ${userId}`)

    return {
      keyboard: this.uiFormatter.getMainMenuKeyboard(),
      text: this.uiFormatter.formatMonthListing(transactions),
    }
  }
}
