import { z } from 'zod'

function normalizeOrigin(origin: string): string {
  return origin.trim().replace(/\/+$/, '')
}

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required.'),
  PORT: z.coerce.number().int().positive().default(6129),
  BETTER_AUTH_SECRET: z.string().min(1).optional(),
  BETTER_AUTH_URL: z.string().url().optional(),
  BETTER_AUTH_TRUSTED_ORIGINS: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
})

export type AppConfig = {
  databaseUrl: string
  port: number
  auth: {
    secret?: string
    baseUrl?: string
    trustedOrigins: string[]
  }
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL']
}

export class ConfigError extends Error {
  issues: Record<string, string[] | undefined>

  constructor(issues: Record<string, string[] | undefined>) {
    super(`Invalid environment: ${Object.keys(issues).join(', ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

/**
 * Validate process environment into a typed config.
 *
 * Better Auth validates request `Origin` for state-changing endpoints, so the
 * configured base URL is always part of the trusted origins list.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors)
  }

  const values = parsed.data
  const trustedOrigins = Array.from(
    new Set(
      [...(values.BETTER_AUTH_TRUSTED_ORIGINS ?? '').split(','), values.BETTER_AUTH_URL ?? '']
        .map((origin) => origin.trim())
        .filter(Boolean)
        .map(normalizeOrigin),
    ),
  )

  return {
    databaseUrl: values.DATABASE_URL,
    port: values.PORT,
    auth: {
      secret: values.BETTER_AUTH_SECRET,
      baseUrl: values.BETTER_AUTH_URL,
      trustedOrigins,
    },
    logLevel: values.LOG_LEVEL,
  }
}
