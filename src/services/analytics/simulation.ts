import type { GoalPlan, SimulationResult } from '../../domain/types'

import { InvalidParameterError } from '../../domain/errors'
import { roundMoney } from './money'

function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(name, `${name} must be a finite number`)
  }
}

function requireNonNegative(name: string, value: number): void {
  requireFinite(name, value)
  if (value < 0) {
    throw new InvalidParameterError(name, `${name} must not be negative`)
  }
}

function validateRateAndHorizon(rate: number, horizonMonths: number): void {
  requireFinite('rate', rate)
  if (rate < -1) {
    throw new InvalidParameterError('rate', 'rate must be at least -1 (a total loss)')
  }

  if (!Number.isInteger(horizonMonths) || horizonMonths <= 0) {
    throw new InvalidParameterError('horizonMonths', 'horizonMonths must be a positive whole number of months')
  }
}

/**
 * Monthly rate equivalent to an annual rate given as a fraction (0.1 = 10% a year)
 */
export function toMonthlyRate(annualRate: number): number {
  return (1 + annualRate) ** (1 / 12) - 1
}

/**
 * Balance after each month: interest is applied first, then the contribution is added.
 * Index 0 holds the starting balance.
 */
function project(start: number, contribution: number, monthlyRate: number, months: number): number[] {
  const timeline = [start]
  let value = start

  for (let month = 1; month <= months; month++) {
    value = value * (1 + monthlyRate) + contribution
    timeline.push(value)
  }

  return timeline
}

/**
 * Compound-interest projection of an investment with fixed monthly contributions
 * @param principal - Amount invested up front
 * @param monthlyContribution - Amount added at the end of every month
 * @param rate - Annual rate as a fraction
 * @param horizonMonths - Number of months to project
 * @throws InvalidParameterError
 */
export function simulate(
  principal: number,
  monthlyContribution: number,
  rate: number,
  horizonMonths: number,
): SimulationResult {
  requireNonNegative('principal', principal)
  requireNonNegative('monthlyContribution', monthlyContribution)
  validateRateAndHorizon(rate, horizonMonths)

  const timeline = project(principal, monthlyContribution, toMonthlyRate(rate), horizonMonths)
  const projectedValue = roundMoney(timeline[horizonMonths] ?? principal)
  const totalContributed = roundMoney(principal + monthlyContribution * horizonMonths)

  return {
    horizonMonths,
    interestEarned: roundMoney(projectedValue - totalContributed),
    monthlyContribution,
    principal,
    projectedValue,
    rate,
    timeline: timeline.map(roundMoney),
    totalContributed,
  }
}

/**
 * Monthly contribution needed to grow `initial` into `target` within the horizon.
 * Zero when the initial amount already gets there on interest alone.
 * @throws InvalidParameterError
 */
export function planGoal(
  target: number,
  initial: number,
  rate: number,
  horizonMonths: number,
): GoalPlan {
  requireFinite('target', target)
  if (target <= 0) {
    throw new InvalidParameterError('target', 'target must be greater than zero')
  }
  requireNonNegative('initial', initial)
  validateRateAndHorizon(rate, horizonMonths)

  const monthlyRate = toMonthlyRate(rate)
  const growth = (1 + monthlyRate) ** horizonMonths
  const rawContribution = monthlyRate !== 0
    ? (target - initial * growth) / ((growth - 1) / monthlyRate)
    : (target - initial) / horizonMonths
  const requiredMonthlyContribution = Math.max(0, rawContribution)

  const timeline = project(initial, requiredMonthlyContribution, monthlyRate, horizonMonths)
  const projectedValue = roundMoney(timeline[horizonMonths] ?? initial)
  const totalContributed = roundMoney(initial + requiredMonthlyContribution * horizonMonths)

  return {
    horizonMonths,
    initial,
    interestEarned: roundMoney(projectedValue - totalContributed),
    projectedValue,
    rate,
    requiredMonthlyContribution: roundMoney(requiredMonthlyContribution),
    target,
    timeline: timeline.map(roundMoney),
    totalContributed,
  }
}
