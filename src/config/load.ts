import { z } from 'zod'

import type { AppConfig } from './types'

import { DEFAULT_CURRENCY, DEFAULT_DASHBOARD_PORT, DEFAULT_LOCALE } from '../constants'

const envSchema = z.object({
  CURRENCY: z.string()
    .regex(/^[A-Z]{3}$/, 'must be an ISO 4217 code such as USD')
    .default(DEFAULT_CURRENCY),
  DASHBOARD_PORT: z.coerce.number()
    .int()
    .min(1)
    .max(65535)
    .default(DEFAULT_DASHBOARD_PORT),
  DASHBOARD_PUBLIC_URL: z.string()
    .url()
    .optional(),
  DATABASE_URL: z.string()
    .optional(),
  DEBUG: z.enum(['true', 'false'])
    .default('false'),
  LOCALE: z.string()
    .min(2)
    .default(DEFAULT_LOCALE),
  TELEGRAM_TOKEN: z.string(),
})

/**
 * Builds the application config from environment variables.
 * Empty variables count as unset.
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => {
      return value !== undefined && value.trim() !== ''
    }),
  )

  const result = envSchema.safeParse(present)
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      return `${issue.path.join('.')}: ${issue.message}`
    })
    throw new Error(`Invalid configuration: ${problems.join('; ')}`)
  }

  const vars = result.data

  return {
    currency: vars.CURRENCY,
    dashboard: {
      port: vars.DASHBOARD_PORT,
      publicUrl: (vars.DASHBOARD_PUBLIC_URL ?? `http://localhost:${vars.DASHBOARD_PORT}`).replace(/\/+$/, ''),
    },
    databaseUrl: vars.DATABASE_URL,
    debug: vars.DEBUG === 'true',
    locale: vars.LOCALE,
    telegramToken: vars.TELEGRAM_TOKEN,
  }
}
