/**
 * Authentication + authorization middleware for the API.
 *
 * - Better Auth is the source of truth for identity/session (see `../auth.ts`).
 * - `user_roles` / `user_temporary_roles` decide who may schedule.
 * - Both collaborators are injected, so routes can be exercised without a
 *   database.
 */

import { randomUUID } from 'node:crypto'
import type { Context, MiddlewareHandler, Next } from 'hono'
import { hasAnyRole, type RoleDirectory } from '../services/roles.js'
import { fail } from '../routes/_api.js'

/** Small user shape used by the API guard layer. */
export type CurrentUser = {
  id: string
  email?: string
  name?: string
}

export type IdentityResolver = (headers: Headers) => Promise<CurrentUser | null>

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string
    user: CurrentUser
  }
}

/**
 * Ensure each request has a stable request id for tracing.
 */
export async function requestId(c: Context, next: Next) {
  const id = c.req.header('x-request-id') ?? randomUUID()
  c.set('requestId', id)
  c.header('x-request-id', id)
  await next()
}

export function getCurrentUser(c: Context): CurrentUser {
  return c.get('user')
}

export type AuthGuards = {
  requireAuth: MiddlewareHandler
  requireRole: (roles: readonly string[]) => MiddlewareHandler
}

export function createAuthGuards(deps: {
  resolveIdentity: IdentityResolver
  roles: RoleDirectory
}): AuthGuards {
  /**
   * Require authenticated user session.
   */
  const requireAuth: MiddlewareHandler = async (c, next) => {
    const user = await deps.resolveIdentity(c.req.raw.headers)
    if (!user) {
      return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)
    }
    c.set('user', user)
    await next()
  }

  /**
   * Require one of `roles`. Runs after `requireAuth`.
   */
  const requireRole =
    (roles: readonly string[]): MiddlewareHandler =>
    async (c, next) => {
      const user = c.get('user')
      if (!user) {
        return fail(c, 'UNAUTHORIZED', 'Authentication required.', 401)
      }
      const allowed = await hasAnyRole(deps.roles, user.id, roles)
      if (!allowed) {
        return fail(c, 'FORBIDDEN', `Requires one of: ${roles.join(', ')}.`, 403)
      }
      await next()
    }

  return { requireAuth, requireRole }
}
