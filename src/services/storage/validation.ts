import { z } from 'zod'

import type { NewTransaction } from '../../domain/types'

import { MAX_AMOUNT } from '../../constants'
import { ValidationError } from '../../domain/errors'
import { isFutureDate, isIsoDate } from '../../utils/dates'

// Column sizes in sql/schema.sql
const DESCRIPTION_MAX_LENGTH = 255
const LABEL_MAX_LENGTH = 50

// Holds for every value written with two decimals, up to the column's range
function hasAtMostTwoDecimals(value: number): boolean {
  return Number(value.toFixed(2)) === value
}

const optionalLabel = z.string()
  .trim()
  .min(1)
  .max(LABEL_MAX_LENGTH)
  .optional()

export const newTransactionSchema = z.object({
  amount: z.number()
    .finite()
    .refine((value) => {
      return value !== 0
    }, 'Amount must not be zero')
    .refine(hasAtMostTwoDecimals, 'Amount must have at most two decimal places')
    .refine((value) => {
      return Math.abs(value) <= MAX_AMOUNT
    }, 'Amount must be less than 10,000,000,000'),
  category: z.string()
    .trim()
    .min(1, 'Category is required')
    .max(LABEL_MAX_LENGTH),
  description: z.string()
    .trim()
    .min(1, 'Description is required')
    .max(DESCRIPTION_MAX_LENGTH),
  occurredOn: z.string()
    .refine(isIsoDate, 'Date must be a valid yyyy-MM-dd date'),
  paymentMethod: optionalLabel,
  source: optionalLabel,
  userId: z.string()
    .regex(/^\d+$/, 'User id must be a Telegram user id'),
})

/**
 * Checks a transaction before it is stored
 * @param now - Reference time for the no-future-dates rule
 * @throws ValidationError with the first problem found
 */
export function validateNewTransaction(input: NewTransaction, now: Date = new Date()): NewTransaction {
  const result = newTransactionSchema.safeParse(input)

  if (!result.success) {
    const [issue] = result.error.issues
    throw new ValidationError(issue?.message ?? 'Invalid transaction')
  }

  if (isFutureDate(result.data.occurredOn, now)) {
    throw new ValidationError('Future dates are not allowed')
  }

  return result.data
}
