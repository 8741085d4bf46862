import type { BotReply } from './types'
import type { UIFormatter } from './ui-formatter'

import { splitMessage } from './ui-formatter'

type ReplyExtra = ReturnType<UIFormatter['toReplyExtra']>

/**
 * The part of a telegraf context a reply needs
 */
export interface ReplyContext {
  reply(text: string, extra?: ReplyExtra): Promise<unknown>
}

/**
 * Sends a reply in chunks under the message limit.
 * Only the last chunk carries the keyboard.
 */
export async function sendReply(ctx: ReplyContext, reply: BotReply, uiFormatter: UIFormatter): Promise<void> {
  const chunks = splitMessage(reply.text)
  const extra = uiFormatter.toReplyExtra(reply)

  for (let i = 0; i < chunks.length - 1; i++) {
    await ctx.reply(chunks[i] ?? '')
  }
  await ctx.reply(chunks[chunks.length - 1] ?? '', extra)
}
