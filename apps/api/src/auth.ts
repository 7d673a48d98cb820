import { betterAuth } from 'better-auth'
import { drizzleAdapter } from 'better-auth/adapters/drizzle'
import { authSchema, users, type Database } from '@escala/db'
import type { AppConfig } from './config.js'
import type { CurrentUser, IdentityResolver } from './middleware/auth.js'

/**
 * Better Auth instance bound to the roster database.
 *
 * Accounts live in `users`, the same row that carries the roster profile
 * (gender, year, fairness counters), so a signed-in session id is directly a
 * roster person id.
 */
export function createAuth(db: Database, config: AppConfig) {
  return betterAuth({
    database: drizzleAdapter(db, {
      provider: 'pg',
      schema: {
        ...authSchema,
        users,
      },
    }),
    secret: config.auth.secret,
    baseURL: config.auth.baseUrl,
    basePath: '/api/auth',
    trustedOrigins: config.auth.trustedOrigins,
    emailAndPassword: {
      enabled: true,
    },
    user: {
      modelName: 'users',
      fields: {
        image: 'avatarUrl',
      },
    },
    session: {
      modelName: 'sessions',
    },
    account: {
      modelName: 'accounts',
    },
    verification: {
      modelName: 'verifications',
    },
  })
}

export type Auth = ReturnType<typeof createAuth>

/** Resolve the signed-in user from Better Auth session cookies/headers. */
export function sessionIdentityResolver(auth: Auth): IdentityResolver {
  return async (headers: Headers): Promise<CurrentUser | null> => {
    const session = await auth.api.getSession({ headers })
    if (!session?.user) return null
    return {
      id: String(session.user.id),
      email: session.user.email,
      name: session.user.name,
    }
  }
}
