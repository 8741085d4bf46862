// domain/types.ts
export type TransactionKind = 'expense' | 'income'

export interface User {
  createdAt?: Date
  firstName?: string
  id: string
  username?: string
}

export interface Transaction {
  amount: number // signed: positive is income, negative is expense
  category: string
  createdAt: Date
  description: string
  id: number
  occurredOn: string // yyyy-MM-dd
  paymentMethod?: string
  source?: string
  userId: string
}

export interface NewTransaction {
  amount: number
  category: string
  description: string
  occurredOn: string
  paymentMethod?: string
  source?: string
  userId: string
}

export interface DateRange {
  from?: string
  to?: string
}

export interface SummaryFilter extends DateRange {
  perUser?: boolean
  userId?: string
}

export interface MonthlySummary {
  month: number // 1-12
  net: number
  totalExpense: number
  totalIncome: number
  transactionCount: number
  userId: null | string
  year: number
}

export interface SimulationResult {
  horizonMonths: number
  interestEarned: number
  monthlyContribution: number
  principal: number
  projectedValue: number
  rate: number
  timeline: number[]
  totalContributed: number
}

export interface GoalPlan {
  horizonMonths: number
  initial: number
  interestEarned: number
  projectedValue: number
  rate: number
  requiredMonthlyContribution: number
  target: number
  timeline: number[]
  totalContributed: number
}

export interface FinancialOverview {
  balance: number
  expenseRatio: number // percent of income spent
  totalExpense: number
  totalIncome: number
}

export interface LabelTotal {
  label: string
  total: number
}

export interface YearlyTotal {
  totalExpense: number
  totalIncome: number
  year: number
}

export interface BalancePoint {
  balance: number
  month: string // yyyy-MM
}

export interface RatioPoint {
  month: string
  ratio: number
}
