import { sql } from 'drizzle-orm'
import { check, index, uniqueIndex } from 'drizzle-orm/pg-core'
import { boolean, integer, pgTable, text, varchar } from 'drizzle-orm/pg-core'
import { idRef, withTimestamps } from './_common'
import { genderEnum } from './enums'

/**
 * users
 *
 * Canonical identity table, shared by:
 * - Better Auth (authentication)
 * - the roster engine (candidate profile + fairness bookkeeping)
 *
 * Ids are account codes (for example "1001"), not generated KSUIDs.
 */
export const users = pgTable('users', {
  id: idRef('id').primaryKey(),

  /** Login identity for Better Auth. */
  email: varchar('email', { length: 255 }).notNull(),
  emailVerified: boolean('email_verified').default(false).notNull(),

  name: varchar('name', { length: 255 }).default('').notNull(),
  avatarUrl: varchar('avatar_url', { length: 500 }),

  gender: genderEnum('gender').default('M').notNull(),

  /** Free-form class/cohort label shown on roster boards. */
  classLabel: text('class_label').default('').notNull(),

  /** Seniority year matched against `posts.eligible_years`. */
  year: integer('year').default(0).notNull(),

  /** Fairness counter for normal-routine (RN) duties. */
  normalDuties: integer('normal_duties').default(0).notNull(),

  /** Fairness counter for weekend/holiday-routine (RD) duties. */
  weekendDuties: integer('weekend_duties').default(0).notNull(),

  /** Debt duties still owed; consuming one never touches the fairness counters. */
  punishmentBalance: integer('punishment_balance').default(0).notNull(),

  ...withTimestamps(),
}, (table) => ({
  usersEmailUnique: uniqueIndex('users_email_unique').on(table.email),
  usersPunishmentIdx: index('users_punishment_balance_idx').on(table.punishmentBalance),
  usersPunishmentNonNegative: check(
    'users_punishment_balance_non_negative',
    sql`"punishment_balance" >= 0`,
  ),
}))

export type User = typeof users.$inferSelect
export type NewUser = typeof users.$inferInsert
