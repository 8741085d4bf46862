import { z, ZodError } from 'zod'

import type { TransactionRepository } from '../services/storage/interfaces'

import { DASHBOARD_PAGE_FILE, TOP_CATEGORIES_LIMIT } from '../constants'
import { FinanceError } from '../domain/errors'
import {
  compare,
  cumulativeBalance,
  incomeExpenseRatio,
  movingAverage,
  overview,
  planGoal,
  simulate,
  summarize,
  totalsByCategory,
  totalsBySource,
  yearlyTotals,
} from '../services/analytics'
import { readProjectFile } from '../utils/file'
import { createLogger } from '../utils/logger'

const logger = createLogger('DashboardApi')

/**
 * Money formatting the page applies to every amount it shows
 */
export interface DashboardSettings {
  currency: string
  locale: string
}

export interface DashboardResponse {
  body: string
  contentType: string
  status: number
}

type QueryParams = Record<string, string>
type RouteHandler = (params: QueryParams) => Promise<unknown>

const optionalText = z.string()
  .trim()
  .min(1)
  .optional()

const rangeQuery = z.object({
  from: optionalText,
  to: optionalText,
})

const summaryQuery = rangeQuery.extend({
  perUser: z.enum(['true', 'false'])
    .optional(),
  userId: optionalText,
})

const compareQuery = rangeQuery.extend({
  userIds: z.string()
    .transform((value) => {
      return value.split(',')
        .map((id) => {
          return id.trim()
        })
        .filter(Boolean)
    })
    .pipe(z.array(z.string())
      .min(1, 'at least one user id is required')),
})

const userQuery = z.object({
  userId: optionalText,
})

const simulateQuery = z.object({
  contribution: z.coerce.number()
    .default(0),
  months: z.coerce.number(),
  principal: z.coerce.number(),
  rate: z.coerce.number(),
})

const goalQuery = z.object({
  initial: z.coerce.number()
    .default(0),
  months: z.coerce.number(),
  rate: z.coerce.number(),
  target: z.coerce.number(),
})

function json(status: number, payload: unknown): DashboardResponse {
  return {
    body: JSON.stringify(payload),
    contentType: 'application/json; charset=utf-8',
    status,
  }
}

/**
 * HTTP-agnostic request handling for the dashboard.
 * Every call reads fresh transactions from the repository.
 */
export class DashboardApi {
  private routes: Map<string, RouteHandler>

  constructor(
    private readonly repository: TransactionRepository,
    private readonly settings: DashboardSettings,
    private readonly loadPage: () => string | undefined = () => {
      return readProjectFile(DASHBOARD_PAGE_FILE)
    },
  ) {
    this.routes = new Map<string, RouteHandler>([
      ['/api/health', this.health.bind(this)],
      ['/api/settings', this.currentSettings.bind(this)],
      ['/api/users', this.users.bind(this)],
      ['/api/summary', this.summary.bind(this)],
      ['/api/compare', this.compare.bind(this)],
      ['/api/overview', this.overview.bind(this)],
      ['/api/simulate', this.simulate.bind(this)],
      ['/api/goal', this.goal.bind(this)],
    ])
  }

  public async handle(method: string, rawUrl: string): Promise<DashboardResponse> {
    const url = new URL(rawUrl, 'http://localhost')

    if (method !== 'GET') {
      return json(405, { error: `Method ${method} not allowed` })
    }

    if (url.pathname === '/' || url.pathname === '/index.html') {
      return this.page()
    }

    const handler = this.routes.get(url.pathname)
    if (!handler) {
      return json(404, { error: `No route for ${url.pathname}` })
    }

    try {
      return json(200, await handler(Object.fromEntries(url.searchParams)))
    }
    catch (error) {
      return this.toErrorResponse(url.pathname, error)
    }
  }

  private toErrorResponse(pathname: string, error: unknown): DashboardResponse {
    if (error instanceof ZodError) {
      const problems = error.issues.map((issue) => {
        return `${issue.path.join('.')}: ${issue.message}`
      })

      return json(400, { code: 'invalid_query', error: problems.join('; ') })
    }

    if (error instanceof FinanceError) {
      return json(400, { code: error.code, error: error.message })
    }

    logger.error(`Error handling ${pathname}:`, error)

    return json(500, { error: 'Internal server error' })
  }

  private page(): DashboardResponse {
    const html = this.loadPage()

    if (html === undefined) {
      return json(404, { error: 'Dashboard page not found' })
    }

    return { body: html, contentType: 'text/html; charset=utf-8', status: 200 }
  }

  private async health(): Promise<unknown> {
    return { status: await this.repository.checkConnection() ? 'ok' : 'degraded' }
  }

  private async currentSettings(): Promise<unknown> {
    return this.settings
  }

  private async users(): Promise<unknown> {
    return this.repository.listUsers()
  }

  private async summary(params: QueryParams): Promise<unknown> {
    const query = summaryQuery.parse(params)
    const transactions = await this.repository.listTransactions({ userId: query.userId })

    return summarize(transactions, {
      from: query.from,
      perUser: query.perUser === 'true',
      to: query.to,
      userId: query.userId,
    })
  }

  private async compare(params: QueryParams): Promise<unknown> {
    const query = compareQuery.parse(params)
    const transactions = await this.repository.listTransactions()

    return Object.fromEntries(compare(transactions, query.userIds, { from: query.from, to: query.to }))
  }

  private async overview(params: QueryParams): Promise<unknown> {
    const { userId } = userQuery.parse(params)
    const transactions = await this.repository.listTransactions({ userId })
    const monthly = summarize(transactions)

    return {
      balance: cumulativeBalance(transactions),
      expenseCategories: totalsByCategory(transactions, 'expense', TOP_CATEGORIES_LIMIT),
      expenseTrend: movingAverage(monthly.map((m) => {
        return m.totalExpense
      })),
      incomeCategories: totalsByCategory(transactions, 'income', TOP_CATEGORIES_LIMIT),
      incomeSources: totalsBySource(transactions, TOP_CATEGORIES_LIMIT),
      incomeTrend: movingAverage(monthly.map((m) => {
        return m.totalIncome
      })),
      monthly,
      ratio: incomeExpenseRatio(transactions),
      totals: overview(transactions),
      yearly: yearlyTotals(transactions),
    }
  }

  private async simulate(params: QueryParams): Promise<unknown> {
    const query = simulateQuery.parse(params)

    return simulate(query.principal, query.contribution, query.rate, query.months)
  }

  private async goal(params: QueryParams): Promise<unknown> {
    const query = goalQuery.parse(params)

    return planGoal(query.target, query.initial, query.rate, query.months)
  }
}
