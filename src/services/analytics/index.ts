// Export the aggregation engine for easier imports
export { compare, isWithinRange, summarize, validateRange } from './aggregation'
export {
  cumulativeBalance,
  incomeExpenseRatio,
  kindOf,
  movingAverage,
  overview,
  totalsByCategory,
  totalsBySource,
  yearlyTotals,
} from './insights'
export { planGoal, simulate, toMonthlyRate } from './simulation'
