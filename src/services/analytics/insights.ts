import type {
  BalancePoint,
  FinancialOverview,
  LabelTotal,
  RatioPoint,
  Transaction,
  TransactionKind,
  YearlyTotal,
} from '../../domain/types'

import { MOVING_AVERAGE_WINDOW } from '../../constants'
import { InvalidParameterError } from '../../domain/errors'
import { monthKey } from '../../utils/dates'
import { fromCents, toCents } from './money'

export function kindOf(transaction: Transaction): TransactionKind {
  return transaction.amount > 0 ? 'income' : 'expense'
}

function sumCents(transactions: readonly Transaction[], kind: TransactionKind): number {
  return transactions
    .filter((t) => {
      return kindOf(t) === kind
    })
    .reduce((total, t) => {
      return total + Math.abs(toCents(t.amount))
    }, 0)
}

/**
 * Headline totals for the dashboard cards
 */
export function overview(transactions: readonly Transaction[]): FinancialOverview {
  const incomeCents = sumCents(transactions, 'income')
  const expenseCents = sumCents(transactions, 'expense')

  return {
    balance: fromCents(incomeCents - expenseCents),
    expenseRatio: incomeCents > 0 ? expenseCents / incomeCents * 100 : 0,
    totalExpense: fromCents(expenseCents),
    totalIncome: fromCents(incomeCents),
  }
}

function totalsBy(
  transactions: readonly Transaction[],
  kind: TransactionKind,
  labelOf: (transaction: Transaction) => string | undefined,
  limit?: number,
): LabelTotal[] {
  const totals = new Map<string, number>()

  for (const transaction of transactions) {
    const label = labelOf(transaction)
    if (kindOf(transaction) !== kind || label === undefined) {
      continue
    }
    totals.set(label, (totals.get(label) ?? 0) + Math.abs(toCents(transaction.amount)))
  }

  const sorted = [...totals.entries()]
    .sort(([labelA, a], [labelB, b]) => {
      return b - a || labelA.localeCompare(labelB)
    })
    .map(([label, cents]) => {
      return { label, total: fromCents(cents) }
    })

  return limit === undefined ? sorted : sorted.slice(0, limit)
}

/**
 * Totals per category for one kind of transaction, largest first
 */
export function totalsByCategory(
  transactions: readonly Transaction[],
  kind: TransactionKind,
  limit?: number,
): LabelTotal[] {
  return totalsBy(transactions, kind, (t) => {
    return t.category
  }, limit)
}

/**
 * Income totals per source, largest first
 */
export function totalsBySource(transactions: readonly Transaction[], limit?: number): LabelTotal[] {
  return totalsBy(transactions, 'income', (t) => {
    return t.source
  }, limit)
}

export function yearlyTotals(transactions: readonly Transaction[]): YearlyTotal[] {
  const years = new Map<number, { expense: number, income: number }>()

  for (const transaction of transactions) {
    const year = Number(transaction.occurredOn.slice(0, 4))
    const entry = years.get(year) ?? { expense: 0, income: 0 }
    const cents = toCents(transaction.amount)

    if (cents > 0) {
      entry.income += cents
    }
    else {
      entry.expense -= cents
    }
    years.set(year, entry)
  }

  return [...years.entries()]
    .sort(([a], [b]) => {
      return a - b
    })
    .map(([year, entry]) => {
      return {
        totalExpense: fromCents(entry.expense),
        totalIncome: fromCents(entry.income),
        year,
      }
    })
}

/**
 * Running balance at the end of every month that has activity
 */
export function cumulativeBalance(transactions: readonly Transaction[]): BalancePoint[] {
  const sorted = [...transactions].sort((a, b) => {
    return a.occurredOn.localeCompare(b.occurredOn)
  })
  const closing = new Map<string, number>()
  let runningCents = 0

  for (const transaction of sorted) {
    runningCents += toCents(transaction.amount)
    closing.set(monthKey(transaction.occurredOn), runningCents)
  }

  return [...closing.entries()].map(([month, cents]) => {
    return { balance: fromCents(cents), month }
  })
}

/**
 * Income divided by expense for each month. Empty unless both kinds are present;
 * months without expenses report 0.
 */
export function incomeExpenseRatio(transactions: readonly Transaction[]): RatioPoint[] {
  const hasIncome = transactions.some((t) => {
    return kindOf(t) === 'income'
  })
  const hasExpense = transactions.some((t) => {
    return kindOf(t) === 'expense'
  })

  if (!hasIncome || !hasExpense) {
    return []
  }

  const months = new Map<string, { expense: number, income: number }>()
  for (const transaction of transactions) {
    const key = monthKey(transaction.occurredOn)
    const entry = months.get(key) ?? { expense: 0, income: 0 }
    const cents = toCents(transaction.amount)

    if (cents > 0) {
      entry.income += cents
    }
    else {
      entry.expense -= cents
    }
    months.set(key, entry)
  }

  return [...months.entries()]
    .sort(([a], [b]) => {
      return a.localeCompare(b)
    })
    .map(([month, entry]) => {
      return {
        month,
        ratio: entry.expense > 0 ? entry.income / entry.expense : 0,
      }
    })
}

/**
 * Trailing mean over `window` values; the first entries average what is available
 * @throws InvalidParameterError when window is not a positive integer
 */
export function movingAverage(values: readonly number[], window = MOVING_AVERAGE_WINDOW): number[] {
  if (!Number.isInteger(window) || window <= 0) {
    throw new InvalidParameterError('window', 'window must be a positive whole number')
  }

  return values.map((_, index) => {
    const slice = values.slice(Math.max(0, index - window + 1), index + 1)

    return slice.reduce((total, value) => {
      return total + value
    }, 0) / slice.length
  })
}
