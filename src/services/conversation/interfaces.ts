import type { ConversationStatusType } from '../../constants/types'
import type { TransactionKind } from '../../domain/types'

/**
 * Answers collected so far by the entry wizard
 */
export interface TransactionDraft {
  amount?: number // always positive here, the sign comes from kind
  category?: string
  description?: string
  kind?: TransactionKind
  occurredOn?: string
  paymentMethod?: string
  source?: string
}

export interface ConversationState {
  draft: TransactionDraft
  lastUpdated: Date
  queryKind?: TransactionKind
  status: ConversationStatusType
  userId: string
}

export interface ConversationManager {
  cleanupOldConversations: (maxAgeHours?: number) => number
  getOrCreateConversation: (userId: string) => ConversationState
  resetConversation: (userId: string) => void
  startEntry: (userId: string, kind: TransactionKind) => ConversationState
  startQuery: (userId: string, kind: TransactionKind) => ConversationState
  updateDraft: (userId: string, patch: Partial<TransactionDraft>) => TransactionDraft
  updateStatus: (userId: string, status: ConversationStatusType) => void
}
