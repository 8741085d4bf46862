import type { TransactionKind } from '../../domain/types'
import type { ConversationManager, ConversationState, TransactionDraft } from './interfaces'

import { CONVERSATION_MAX_AGE_HOURS } from '../../constants'
import { ConversationStatus } from '../../constants/types'
import { createLogger } from '../../utils/logger'

const logger = createLogger('ConversationManager')

export class MemoryConversationManager implements ConversationManager {
  private conversations = new Map<string, ConversationState>()

  constructor(private readonly clock: () => Date = () => {
    return new Date()
  }) {}

  private createConversation(userId: string): ConversationState {
    const conversation: ConversationState = {
      draft: {},
      lastUpdated: this.clock(),
      status: ConversationStatus.IDLE,
      userId,
    }
    this.conversations.set(userId, conversation)

    return conversation
  }

  getOrCreateConversation(userId: string): ConversationState {
    const existing = this.conversations.get(userId)
    if (existing) {
      return existing
    }

    logger.debug(`Creating new conversation for user ${userId}`)

    return this.createConversation(userId)
  }

  resetConversation(userId: string): void {
    logger.debug(`Resetting conversation for user ${userId}`)
    this.createConversation(userId)
  }

  startEntry(userId: string, kind: TransactionKind): ConversationState {
    const conversation = this.createConversation(userId)
    conversation.draft.kind = kind
    conversation.status = ConversationStatus.AWAITING_DESCRIPTION

    logger.debug(`Started ${kind} entry for user ${userId}`)

    return conversation
  }

  startQuery(userId: string, kind: TransactionKind): ConversationState {
    const conversation = this.createConversation(userId)
    conversation.queryKind = kind
    conversation.status = ConversationStatus.AWAITING_QUERY_MONTH

    logger.debug(`Started ${kind} month query for user ${userId}`)

    return conversation
  }

  updateDraft(userId: string, patch: Partial<TransactionDraft>): TransactionDraft {
    const conversation = this.getOrCreateConversation(userId)
    conversation.draft = { ...conversation.draft, ...patch }
    conversation.lastUpdated = this.clock()

    logger.debug(`Updated draft for user ${userId}`, { fields: Object.keys(patch) })

    return conversation.draft
  }

  updateStatus(userId: string, status: ConversationState['status']): void {
    const conversation = this.getOrCreateConversation(userId)
    const oldStatus = conversation.status
    conversation.status = status
    conversation.lastUpdated = this.clock()

    logger.debug(`Updated status for user ${userId}`, {
      from: oldStatus,
      to: status,
    })
  }

  /**
   * Drops conversations untouched for longer than maxAgeHours
   * @returns The number of conversations removed
   */
  cleanupOldConversations(maxAgeHours = CONVERSATION_MAX_AGE_HOURS): number {
    const now = this.clock()
    let cleanedCount = 0

    for (const [userId, conversation] of this.conversations.entries()) {
      const ageHours = (now.getTime() - conversation.lastUpdated.getTime()) / (1000 * 60 * 60)
      if (ageHours > maxAgeHours) {
        this.conversations.delete(userId)
        cleanedCount++
      }
    }

    if (cleanedCount > 0) {
      logger.info(`Cleaned up ${cleanedCount} old conversations`, {
        maxAgeHours,
        remainingCount: this.conversations.size,
      })
    }

    return cleanedCount
  }
}
