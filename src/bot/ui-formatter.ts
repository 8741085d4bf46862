import { Markup } from 'telegraf'

import type { FinancialOverview, MonthlySummary, Transaction, TransactionKind } from '../domain/types'
import type { BotReply } from './types'

import { CATEGORIES, INCOME_SOURCES, MAX_MESSAGE_LENGTH, MONTH_NAMES, PAYMENT_METHODS } from '../constants'
import { Command, DateChoice } from '../constants/types'
import { formatDisplayDate } from '../utils/dates'

const CANCEL_ROW = [`/${Command.CANCEL}`]
const MONTHS_PER_ROW = 3

/**
 * Splits a long message into chunks under the Telegram limit,
 * preferring blank lines, then single line breaks.
 */
export function splitMessage(text: string, maxLength = MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= maxLength) {
    return [text]
  }

  const chunks: string[] = []
  let currentChunk = ''

  const append = (piece: string, separator: string) => {
    if (currentChunk.length > 0 && currentChunk.length + separator.length + piece.length > maxLength) {
      chunks.push(currentChunk)
      currentChunk = ''
    }

    // A single line longer than the limit is cut hard
    while (piece.length > maxLength) {
      if (currentChunk.length > 0) {
        chunks.push(currentChunk)
        currentChunk = ''
      }
      chunks.push(piece.slice(0, maxLength))
      piece = piece.slice(maxLength)
    }

    currentChunk += (currentChunk.length > 0 ? separator : '') + piece
  }

  for (const block of text.split('\n\n')) {
    if (block.length <= maxLength) {
      append(block, '\n\n')
      continue
    }

    block.split('\n').forEach((line, index) => {
      append(line, index === 0 ? '\n\n' : '\n')
    })
  }

  if (currentChunk.length > 0) {
    chunks.push(currentChunk)
  }

  return chunks
}

export class UIFormatter {
  private readonly money: Intl.NumberFormat

  constructor(currency: string, locale: string) {
    this.money = new Intl.NumberFormat(locale, { currency, style: 'currency' })
  }

  public formatMoney(amount: number): string {
    return this.money.format(amount)
  }

  public getMainMenuKeyboard(): string[][] {
    return [
      [`/${Command.INCOME}`, `/${Command.EXPENSE}`],
      [`/${Command.LIST_INCOME}`, `/${Command.LIST_EXPENSE}`],
      [`/${Command.SUMMARY}`, `/${Command.DASHBOARD}`],
    ]
  }

  public getCategoryKeyboard(kind: TransactionKind): string[][] {
    return [...CATEGORIES[kind], CANCEL_ROW]
  }

  public getSourceKeyboard(): string[][] {
    return [...INCOME_SOURCES, CANCEL_ROW]
  }

  public getPaymentMethodKeyboard(): string[][] {
    return [...PAYMENT_METHODS, CANCEL_ROW]
  }

  public getDateKeyboard(): string[][] {
    return [[DateChoice.TODAY, DateChoice.OTHER], CANCEL_ROW]
  }

  public getCancelKeyboard(): string[][] {
    return [CANCEL_ROW]
  }

  public getMonthKeyboard(): string[][] {
    const rows: string[][] = []
    for (let i = 0; i < MONTH_NAMES.length; i += MONTHS_PER_ROW) {
      rows.push(MONTH_NAMES.slice(i, i + MONTHS_PER_ROW))
    }

    return [...rows, CANCEL_ROW]
  }

  /**
   * Converts a reply into the extra options telegraf's ctx.reply expects
   */
  public toReplyExtra(reply: BotReply) {
    if (reply.keyboard) {
      return Markup.keyboard(reply.keyboard)
        .resize()
        .oneTime()
    }

    if (reply.removeKeyboard) {
      return Markup.removeKeyboard()
    }

    return undefined
  }

  public formatTransactionLine(transaction: Transaction): string {
    return `📌 ${formatDisplayDate(transaction.occurredOn)} - ${transaction.category} - ${this.formatMoney(Math.abs(transaction.amount))} (${transaction.description})`
  }

  public formatMonthListing(transactions: Transaction[]): string {
    if (transactions.length === 0) {
      return '📭 No records found for this month.'
    }

    return transactions
      .map((transaction) => {
        return this.formatTransactionLine(transaction)
      })
      .join('\n')
  }

  public formatMonthlySummary(summary: MonthlySummary | undefined, year: number, month: number): string {
    const title = `📊 ${MONTH_NAMES[month - 1] ?? month} ${year}`

    if (!summary) {
      return `${title}\nNo transactions recorded this month.`
    }

    return `${title}
Income: ${this.formatMoney(summary.totalIncome)}
Expenses: ${this.formatMoney(summary.totalExpense)}
Net: ${this.formatMoney(summary.net)}
Transactions: ${summary.transactionCount}`
  }

  public formatOverview(totals: FinancialOverview): string {
    return `📈 All time
Income: ${this.formatMoney(totals.totalIncome)}
Expenses: ${this.formatMoney(totals.totalExpense)}
Balance: ${this.formatMoney(totals.balance)}
Spent: ${totals.expenseRatio.toFixed(1)}% of income`
  }

  /**
   * Link to the dashboard, filtered down to one user
   */
  public formatDashboardLink(publicUrl: string, userId: string): string {
    const url = `${publicUrl}/?userId=${encodeURIComponent(userId)}`

    return `🔗 Open the finance dashboard: ${url}

There you can see charts, detailed analysis and the investment and goal simulators, filtered down to your own transactions.`
  }
}
