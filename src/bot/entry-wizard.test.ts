import { beforeEach, describe, expect, it } from 'vitest'

import type { Transaction } from '../domain/types'

import { ConversationStatus } from '../constants/types'
import { MemoryConversationManager } from '../services/conversation/manager'
import { MemoryTransactionRepository } from '../services/storage/memory-repository'
import { EntryWizard } from './entry-wizard'
import { UIFormatter } from './ui-formatter'

const now = new Date(2024, 5, 15, 12)
const clock = () => {
  return now
}

class FailingRepository extends MemoryTransactionRepository {
  async addTransaction(): Promise<Transaction> {
    throw new Error('connection lost')
  }
}

describe('EntryWizard', () => {
  let conversations: MemoryConversationManager
  let repository: MemoryTransactionRepository
  let formatter: UIFormatter
  let wizard: EntryWizard

  beforeEach(() => {
    conversations = new MemoryConversationManager(clock)
    repository = new MemoryTransactionRepository(clock)
    formatter = new UIFormatter('USD', 'en-US')
    wizard = new EntryWizard(conversations, repository, formatter, clock)
  })

  it('records an expense step by step', async () => {
    expect(wizard.begin('101', 'expense')).toEqual({
      removeKeyboard: true,
      text: '📤 Let\'s record an expense!\n\nFirst, what is the description?',
    })

    expect(await wizard.handleText('101', 'Lunch')).toEqual({
      keyboard: formatter.getCategoryKeyboard('expense'),
      text: '🗂 Choose the category:',
    })
    expect((await wizard.handleText('101', 'Pizza'))?.text).toBe('⚠️ Invalid category! Use the buttons.')
    expect((await wizard.handleText('101', 'Food'))?.text).toBe('💳 What was the payment method?')
    expect((await wizard.handleText('101', 'Cash'))?.text).toBe('💰 What is the amount? (e.g. 150.75)')
    expect((await wizard.handleText('101', 'abc'))?.text)
      .toBe('⚠️ Invalid amount! Enter a positive number (e.g. 1234.56 or 1234,56).')
    expect((await wizard.handleText('101', '12,50'))?.text).toBe('📅 Transaction date:')
    expect(await wizard.handleText('101', 'Today')).toEqual({
      keyboard: formatter.getMainMenuKeyboard(),
      text: '✅ Record saved successfully!',
    })

    const stored = await repository.listTransactions()
    expect(stored).toHaveLength(1)
    expect(stored[0]).toMatchObject({
      amount: -12.5,
      category: 'Food',
      description: 'Lunch',
      occurredOn: '2024-06-15',
      paymentMethod: 'Cash',
      userId: '101',
    })
    expect(stored[0]?.source).toBeUndefined()
    expect(conversations.getOrCreateConversation('101').status).toBe(ConversationStatus.IDLE)
  })

  it('registers a user who never sent /start when the first record is saved', async () => {
    await expect(repository.listUsers()).resolves.toEqual([])

    wizard.begin('303', 'expense')
    await wizard.handleText('303', 'Coffee')
    await wizard.handleText('303', 'Food')
    await wizard.handleText('303', 'Cash')
    await wizard.handleText('303', '3')

    expect((await wizard.handleText('303', 'Today'))?.text).toBe('✅ Record saved successfully!')
    await expect(repository.listUsers()).resolves.toEqual([{ createdAt: now, id: '303' }])
  })

  it('records an income with a typed date', async () => {
    wizard.begin('101', 'income')
    await wizard.handleText('101', 'June salary')
    expect((await wizard.handleText('101', 'Salary'))?.text).toBe('🏦 What is the source of this income?')
    expect((await wizard.handleText('101', 'Lottery'))?.text).toBe('⚠️ Invalid source! Use the buttons.')
    expect((await wizard.handleText('101', 'Main'))?.text).toBe('💰 What is the amount? (e.g. 1500.50)')
    await wizard.handleText('101', '3000')
    expect((await wizard.handleText('101', 'Other date'))?.text).toBe('📅 Enter the date (DD/MM/YYYY):')
    expect((await wizard.handleText('101', '31/02/2024'))?.text).toBe('⚠️ Invalid format! Use DD/MM/YYYY')
    expect((await wizard.handleText('101', '16/06/2024'))?.text).toBe('⚠️ Future date! Use a valid date.')
    expect((await wizard.handleText('101', '01/06/2024'))?.text).toBe('✅ Record saved successfully!')

    const [stored] = await repository.listTransactions()
    expect(stored).toMatchObject({ amount: 3000, category: 'Salary', occurredOn: '2024-06-01', source: 'Main' })
    expect(stored?.paymentMethod).toBeUndefined()
  })

  it('accepts a date typed instead of picking a button', async () => {
    wizard.begin('101', 'expense')
    await wizard.handleText('101', 'Bus')
    await wizard.handleText('101', 'Transport')
    await wizard.handleText('101', 'Debit card')
    await wizard.handleText('101', '4')

    expect((await wizard.handleText('101', '10/06/2024'))?.text).toBe('✅ Record saved successfully!')
    const [stored] = await repository.listTransactions()
    expect(stored?.occurredOn).toBe('2024-06-10')
  })

  it('ignores text when no dialog is running', async () => {
    await expect(wizard.handleText('101', 'hello')).resolves.toBeUndefined()
  })

  it('cancels back to the main menu', async () => {
    wizard.begin('101', 'expense')
    await wizard.handleText('101', 'Lunch')

    expect(wizard.cancel('101')).toEqual({ keyboard: formatter.getMainMenuKeyboard(), text: '❌ Operation cancelled.' })
    expect(conversations.getOrCreateConversation('101').status).toBe(ConversationStatus.IDLE)
  })

  it('reports a storage failure and resets the dialog', async () => {
    wizard = new EntryWizard(conversations, new FailingRepository(clock), formatter, clock)
    wizard.begin('101', 'expense')
    await wizard.handleText('101', 'Lunch')
    await wizard.handleText('101', 'Food')
    await wizard.handleText('101', 'Cash')
    await wizard.handleText('101', '10')

    expect((await wizard.handleText('101', 'Today'))?.text).toBe('❌ Error saving! Please try again.')
    expect(conversations.getOrCreateConversation('101').status).toBe(ConversationStatus.IDLE)
  })

  describe('month query', () => {
    beforeEach(async () => {
      await repository.addTransaction({ amount: -4, category: 'Transport', description: 'Bus', occurredOn: '2024-06-10', paymentMethod: 'Cash', userId: '101' })
      await repository.addTransaction({ amount: -12.5, category: 'Food', description: 'Lunch', occurredOn: '2024-06-03', paymentMethod: 'Cash', userId: '101' })
      await repository.addTransaction({ amount: 3000, category: 'Salary', description: 'Pay', occurredOn: '2024-06-01', source: 'Main', userId: '101' })
      await repository.addTransaction({ amount: -80, category: 'Food', description: 'Groceries', occurredOn: '2024-05-20', paymentMethod: 'Cash', userId: '101' })
      await repository.addTransaction({ amount: -7, category: 'Food', description: 'Snack', occurredOn: '2024-06-04', paymentMethod: 'Cash', userId: '202' })
    })

    it('lists the chosen kind for a month of the current year', async () => {
      expect(wizard.beginQuery('101', 'expense')).toEqual({
        keyboard: formatter.getMonthKeyboard(),
        text: '📅 Which month of expenses do you want to see?',
      })

      expect(await wizard.handleText('101', 'june')).toEqual({
        keyboard: formatter.getMainMenuKeyboard(),
        text: '📌 03/06/2024 - Food - $12.50 (Lunch)\n📌 10/06/2024 - Transport - $4.00 (Bus)',
      })
      expect(conversations.getOrCreateConversation('101').status).toBe(ConversationStatus.IDLE)
    })

    it('lists income', async () => {
      wizard.beginQuery('101', 'income')

      expect((await wizard.handleText('101', 'June'))?.text).toBe('📌 01/06/2024 - Salary - $3,000.00 (Pay)')
    })

    it('reports an empty month', async () => {
      wizard.beginQuery('101', 'expense')

      expect((await wizard.handleText('101', 'March'))?.text).toBe('📭 No records found for this month.')
    })

    it('asks again for an unknown month', async () => {
      wizard.beginQuery('101', 'expense')

      expect((await wizard.handleText('101', 'Junho'))?.text).toBe('⚠️ Invalid month! Use the buttons.')
      expect(conversations.getOrCreateConversation('101').status).toBe(ConversationStatus.AWAITING_QUERY_MONTH)
    })
  })
})
