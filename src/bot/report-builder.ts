import type { TransactionRepository } from '../services/storage/interfaces'
import type { UIFormatter } from './ui-formatter'

import { overview, summarize } from '../services/analytics'
import { monthRange } from '../utils/dates'

/**
 * Builds the /summary message: this month's totals and the all-time overview
 */
export class ReportBuilder {
  constructor(
    private readonly repository: TransactionRepository,
    private readonly uiFormatter: UIFormatter,
    private readonly clock: () => Date = () => {
      return new Date()
    },
  ) {}

  public async buildSummary(userId: string): Promise<string> {
    const now = this.clock()
    const year = now.getFullYear()
    const month = now.getMonth() + 1

    const transactions = await this.repository.listTransactions({ userId })
    const [current] = summarize(transactions, { ...monthRange(year, month), userId })

    return `${this.uiFormatter.formatMonthlySummary(current, year, month)}\n\n${this.uiFormatter.formatOverview(overview(transactions))}`
  }
}
