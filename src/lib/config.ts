/**
 * Runtime configuration read from Vite's `import.meta.env`.
 *
 * Parsed once at import; invalid values fail fast with a ConfigError
 * listing every offending variable.
 */

import { z } from 'zod'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

// Larger values overflow setTimeout and fire almost immediately
const MAX_TIMER_DELAY_MS = 2_147_483_647

const envSchema = z.object({
  VITE_USER_LOOKUP_DELAY_MS: z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform(Number)
    .pipe(z.number().int().max(MAX_TIMER_DELAY_MS, 'exceeds the maximum timer delay'))
    .default('500'),
  VITE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export interface AppConfig {
  /** Simulated latency of the in-memory user lookup */
  userLookupDelayMs: number
  logLevel: LogLevel
}

export class ConfigError extends Error {
  issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  // Empty strings come from `VAR=` lines in .env files; treat them as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  )
  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  return Object.freeze({
    userLookupDelayMs: parsed.data.VITE_USER_LOOKUP_DELAY_MS,
    logLevel: parsed.data.VITE_LOG_LEVEL,
  })
}

export const config = loadConfig({
  VITE_USER_LOOKUP_DELAY_MS: import.meta.env.VITE_USER_LOOKUP_DELAY_MS,
  VITE_LOG_LEVEL: import.meta.env.VITE_LOG_LEVEL,
})
