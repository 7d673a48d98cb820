import { and, eq, gt, lte, sql } from 'drizzle-orm'
import { userRoles, userTemporaryRoles, type Database } from '@escala/db'

/** Roles allowed to generate, publish, reopen and decide swaps. */
export const SCHEDULER_ROLES = ['admin', 'scheduler'] as const

export interface RoleDirectory {
  /** Permanent and currently active temporary roles of `userId`, lower-cased. */
  rolesOf(userId: string, at?: Date): Promise<string[]>
}

export function normalizeRole(role: string): string {
  return role.trim().toLowerCase()
}

export async function hasAnyRole(
  directory: RoleDirectory,
  userId: string,
  roles: readonly string[],
  at?: Date,
): Promise<boolean> {
  const wanted = new Set(roles.map(normalizeRole))
  const held = await directory.rolesOf(userId, at)
  return held.some((role) => wanted.has(normalizeRole(role)))
}

/**
 * Role lookup backed by `user_roles` and `user_temporary_roles`.
 * A temporary grant counts while `starts_at <= at < ends_at`.
 */
export function createRoleDirectory(db: Database): RoleDirectory {
  return {
    async rolesOf(userId, at = new Date()) {
      const [permanent, temporary] = await Promise.all([
        db
          .select({ role: sql<string>`lower(${userRoles.role})` })
          .from(userRoles)
          .where(eq(userRoles.userId, userId)),
        db
          .select({ role: sql<string>`lower(${userTemporaryRoles.role})` })
          .from(userTemporaryRoles)
          .where(
            and(
              eq(userTemporaryRoles.userId, userId),
              lte(userTemporaryRoles.startsAt, at),
              gt(userTemporaryRoles.endsAt, at),
            ),
          ),
      ])
      return Array.from(new Set([...permanent, ...temporary].map((row) => row.role)))
    },
  }
}

/** In-memory directory for scripts and tests: `{ userId: ['scheduler'] }`. */
export function createStaticRoleDirectory(assignments: Record<string, string[]>): RoleDirectory {
  return {
    async rolesOf(userId) {
      return (assignments[userId] ?? []).map(normalizeRole)
    },
  }
}
