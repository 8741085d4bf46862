import type { DateRange, MonthlySummary, SummaryFilter, Transaction } from '../../domain/types'

import { InvalidFilterError } from '../../domain/errors'
import { isIsoDate } from '../../utils/dates'
import { fromCents, toCents } from './money'

interface MonthlyAccumulator {
  count: number
  expenseCents: number
  incomeCents: number
  month: number
  userId: null | string
  year: number
}

/**
 * Checks both ends of a date range and that it is not reversed
 * @throws InvalidFilterError
 */
export function validateRange(range: DateRange): DateRange {
  const { from, to } = range

  if (from !== undefined && !isIsoDate(from)) {
    throw new InvalidFilterError(`Invalid start date "${from}", expected yyyy-MM-dd`)
  }

  if (to !== undefined && !isIsoDate(to)) {
    throw new InvalidFilterError(`Invalid end date "${to}", expected yyyy-MM-dd`)
  }

  if (from !== undefined && to !== undefined && to < from) {
    throw new InvalidFilterError(`Date range end ${to} precedes start ${from}`)
  }

  return { from, to }
}

export function isWithinRange(isoDate: string, range: DateRange): boolean {
  if (range.from !== undefined && isoDate < range.from) {
    return false
  }

  return range.to === undefined || isoDate <= range.to
}

function compareSummaries(a: MonthlySummary, b: MonthlySummary): number {
  if (a.year !== b.year) {
    return a.year - b.year
  }

  if (a.month !== b.month) {
    return a.month - b.month
  }

  const left = a.userId ?? ''
  const right = b.userId ?? ''

  if (left === right) {
    return 0
  }

  return left < right ? -1 : 1
}

function toSummary(group: MonthlyAccumulator): MonthlySummary {
  return {
    month: group.month,
    net: fromCents(group.incomeCents - group.expenseCents),
    totalExpense: fromCents(group.expenseCents),
    totalIncome: fromCents(group.incomeCents),
    transactionCount: group.count,
    userId: group.userId,
    year: group.year,
  }
}

/**
 * Groups transactions into calendar months, in chronological order.
 *
 * When `filter.userId` is set only that user's transactions are counted and
 * each summary carries the user id; `filter.perUser` splits every month by
 * user instead of pooling all users into a single `userId: null` row.
 * Expense totals are reported as positive magnitudes.
 * @throws InvalidFilterError when the date range is malformed or reversed
 */
export function summarize(transactions: readonly Transaction[], filter: SummaryFilter = {}): MonthlySummary[] {
  const range = validateRange(filter)
  const splitByUser = filter.perUser === true || filter.userId !== undefined
  const groups = new Map<string, MonthlyAccumulator>()

  for (const transaction of transactions) {
    if (filter.userId !== undefined && transaction.userId !== filter.userId) {
      continue
    }

    if (!isWithinRange(transaction.occurredOn, range)) {
      continue
    }

    const year = Number(transaction.occurredOn.slice(0, 4))
    const month = Number(transaction.occurredOn.slice(5, 7))
    const userId = splitByUser ? transaction.userId : null
    const key = `${transaction.occurredOn.slice(0, 7)}|${userId ?? ''}`

    let group = groups.get(key)
    if (!group) {
      group = { count: 0, expenseCents: 0, incomeCents: 0, month, userId, year }
      groups.set(key, group)
    }

    const cents = toCents(transaction.amount)
    if (cents > 0) {
      group.incomeCents += cents
    }
    else {
      group.expenseCents -= cents
    }
    group.count++
  }

  return [...groups.values()]
    .map(toSummary)
    .sort(compareSummaries)
}

/**
 * Monthly summaries partitioned by user. Every requested id gets an entry,
 * empty when that user has no transactions in range.
 * @throws InvalidFilterError when the date range is malformed or reversed
 */
export function compare(
  transactions: readonly Transaction[],
  userIds: readonly string[],
  range: DateRange = {},
): Map<string, MonthlySummary[]> {
  const checkedRange = validateRange(range)
  const result = new Map<string, MonthlySummary[]>()

  for (const userId of userIds) {
    if (result.has(userId)) {
      continue
    }

    result.set(userId, summarize(transactions, { ...checkedRange, userId }))
  }

  return result
}
