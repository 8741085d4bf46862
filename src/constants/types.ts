/**
 * Conversation status values, one per step of the entry wizard
 */
export const ConversationStatus = {
  AWAITING_AMOUNT: 'awaiting_amount',
  AWAITING_CATEGORY: 'awaiting_category',
  AWAITING_DATE: 'awaiting_date',
  AWAITING_DESCRIPTION: 'awaiting_description',
  AWAITING_MANUAL_DATE: 'awaiting_manual_date',
  AWAITING_PAYMENT_METHOD: 'awaiting_payment_method',
  AWAITING_QUERY_MONTH: 'awaiting_query_month',
  AWAITING_SOURCE: 'awaiting_source',
  IDLE: 'idle',
} as const

/**
 * Type for conversation status
 */
export type ConversationStatusType = typeof ConversationStatus[keyof typeof ConversationStatus]

/**
 * Bot command names (without the leading slash)
 */
export const Command = {
  CANCEL: 'cancel',
  DASHBOARD: 'dashboard',
  EXPENSE: 'expense',
  INCOME: 'income',
  LIST_EXPENSE: 'list_expense',
  LIST_INCOME: 'list_income',
  START: 'start',
  SUMMARY: 'summary',
} as const

/**
 * Answers offered on the date step
 */
export const DateChoice = {
  OTHER: 'Other date',
  TODAY: 'Today',
} as const
