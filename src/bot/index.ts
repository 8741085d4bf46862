// Export all bot-related components for easier imports
export { EntryWizard } from './entry-wizard'
export { FinanceBotFactory } from './factory'
export { FinanceBot } from './finance-bot'
export { sendReply } from './reply-sender'
export type { ReplyContext } from './reply-sender'
export { ReportBuilder } from './report-builder'
export { splitMessage, UIFormatter } from './ui-formatter'
