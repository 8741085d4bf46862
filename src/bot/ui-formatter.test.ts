import { describe, expect, it } from 'vitest'

import type { Transaction } from '../domain/types'

import { splitMessage, UIFormatter } from './ui-formatter'

const formatter = new UIFormatter('USD', 'en-US')

const lunch: Transaction = {
  amount: -12.5,
  category: 'Food',
  createdAt: new Date(2024, 5, 3),
  description: 'Lunch',
  id: 1,
  occurredOn: '2024-06-03',
  paymentMethod: 'Cash',
  userId: '101',
}

describe('splitMessage', () => {
  it('leaves short messages alone', () => {
    expect(splitMessage('hello', 10)).toEqual(['hello'])
  })

  it('splits on blank lines first', () => {
    expect(splitMessage('aaaa\n\nbbbb\n\ncccc', 10)).toEqual(['aaaa\n\nbbbb', 'cccc'])
  })

  it('falls back to single line breaks inside a long block', () => {
    expect(splitMessage('line1\nline2\nline3', 12)).toEqual(['line1\nline2', 'line3'])
  })

  it('cuts a line longer than the limit', () => {
    expect(splitMessage('x'.repeat(25), 10)).toEqual(['x'.repeat(10), 'x'.repeat(10), 'x'.repeat(5)])
  })

  it('never produces a chunk over the limit', () => {
    const text = Array.from({ length: 200 }, (_, i) => {
      return `line number ${i}`
    }).join('\n')

    for (const chunk of splitMessage(text, 100)) {
      expect(chunk.length).toBeLessThanOrEqual(100)
    }
  })
})

describe('UIFormatter', () => {
  it('formats money in the configured currency', () => {
    expect(formatter.formatMoney(1500.5)).toBe('$1,500.50')
  })

  it('formats a transaction line with the absolute amount', () => {
    expect(formatter.formatTransactionLine(lunch)).toBe('📌 03/06/2024 - Food - $12.50 (Lunch)')
  })

  it('lists a month, or says it is empty', () => {
    expect(formatter.formatMonthListing([])).toBe('📭 No records found for this month.')
    expect(formatter.formatMonthListing([lunch, { ...lunch, amount: -4, description: 'Bus', id: 2 }]))
      .toBe('📌 03/06/2024 - Food - $12.50 (Lunch)\n📌 03/06/2024 - Food - $4.00 (Bus)')
  })

  it('formats a monthly summary', () => {
    expect(formatter.formatMonthlySummary(undefined, 2024, 3)).toBe('📊 March 2024\nNo transactions recorded this month.')
    expect(formatter.formatMonthlySummary({
      month: 6,
      net: -150,
      totalExpense: 650,
      totalIncome: 500,
      transactionCount: 4,
      userId: '101',
      year: 2024,
    }, 2024, 6)).toBe('📊 June 2024\nIncome: $500.00\nExpenses: $650.00\nNet: -$150.00\nTransactions: 4')
  })

  it('formats the overview', () => {
    expect(formatter.formatOverview({ balance: 1900, expenseRatio: 24, totalExpense: 600, totalIncome: 2500 }))
      .toBe('📈 All time\nIncome: $2,500.00\nExpenses: $600.00\nBalance: $1,900.00\nSpent: 24.0% of income')
  })

  it('lays out months three per row with a cancel row', () => {
    const keyboard = formatter.getMonthKeyboard()

    expect(keyboard).toHaveLength(5)
    expect(keyboard[0]).toEqual(['January', 'February', 'March'])
    expect(keyboard[4]).toEqual(['/cancel'])
  })

  it('ends every choice keyboard with cancel', () => {
    for (const keyboard of [
      formatter.getCategoryKeyboard('income'),
      formatter.getSourceKeyboard(),
      formatter.getPaymentMethodKeyboard(),
      formatter.getDateKeyboard(),
    ]) {
      expect(keyboard[keyboard.length - 1]).toEqual(['/cancel'])
    }
  })

  it('turns replies into reply markup', () => {
    const rows = [['/income', '/expense']]

    expect(formatter.toReplyExtra({ keyboard: rows, text: 'Menu' })?.reply_markup)
      .toMatchObject({ keyboard: rows, one_time_keyboard: true, resize_keyboard: true })
    expect(formatter.toReplyExtra({ removeKeyboard: true, text: 'Description?' })?.reply_markup)
      .toMatchObject({ remove_keyboard: true })
    expect(formatter.toReplyExtra({ text: 'Plain' })).toBeUndefined()
  })

  it('links the dashboard filtered to the user', () => {
    expect(formatter.formatDashboardLink('http://localhost:3000', '101')).toBe(`🔗 Open the finance dashboard: http://localhost:3000/?userId=101

There you can see charts, detailed analysis and the investment and goal simulators, filtered down to your own transactions.`)
  })
})
