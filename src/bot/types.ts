/**
 * A message the bot sends back, independent of telegraf
 */
export interface BotReply {
  keyboard?: string[][] // reply keyboard rows
  removeKeyboard?: boolean
  text: string
}
