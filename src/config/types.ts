// config/types.ts
export interface AppConfig {
  telegramToken: string

  // PostgreSQL connection string, transactions stay in memory without it
  databaseUrl?: string

  dashboard: {
    port: number
    publicUrl: string
  }

  // Money formatting
  currency: string
  locale: string

  debug: boolean
}
