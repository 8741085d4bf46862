import type { TransactionKind } from './domain/types'

import { ConversationStatus } from './constants/types'

// Re-export from types
export const STATUS_MAP = ConversationStatus

// Keyboard layouts, one inner array per row
export const CATEGORIES: Record<TransactionKind, string[][]> = {
  expense: [
    ['Food', 'Housing'],
    ['Transport', 'Health'],
    ['Leisure', 'Education', 'Credit card'],
  ],
  income: [
    ['Salary', 'Investments'],
    ['Freelance', 'Sales'],
    ['Rent', 'Dividends', 'Side income'],
  ],
}

export const INCOME_SOURCES = [
  ['Main', 'Extra'],
  ['Investment', 'Bonus'],
  ['Other'],
]

export const PAYMENT_METHODS = [
  ['Credit card', 'Debit card'],
  ['Cash', 'Instant payment'],
  ['Bank slip', 'Bank transfer'],
]

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
]

// Time intervals
export const CONVERSATION_CLEANUP_INTERVAL_MS = 1000 * 60 * 15 // 15 minutes
export const CONVERSATION_MAX_AGE_HOURS = 24

// Largest magnitude NUMERIC(12, 2) in sql/schema.sql holds
export const MAX_AMOUNT = 9_999_999_999.99

// Telegram message length limit
export const MAX_MESSAGE_LENGTH = 4096

// Dashboard defaults
export const DEFAULT_DASHBOARD_PORT = 12000
export const DEFAULT_CURRENCY = 'USD'
export const DEFAULT_LOCALE = 'en-US'
export const MOVING_AVERAGE_WINDOW = 3
export const TOP_CATEGORIES_LIMIT = 5

// File paths, relative to the project root
export const DASHBOARD_PAGE_FILE = 'public/dashboard.html'
export const SCHEMA_FILE = 'sql/schema.sql'
