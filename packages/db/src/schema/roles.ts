import { sql } from "drizzle-orm";
import { check, index, pgTable, primaryKey, timestamp, varchar } from "drizzle-orm/pg-core";
import { idRef, idWithTag } from "./_common";
import { users } from "./users";

/**
 * user_roles
 *
 * Permanent role membership. Role keys are stored lower-case
 * (`admin`, `scheduler`, ...).
 */
export const userRoles = pgTable(
  "user_roles",
  {
    userId: idRef("user_id")
      .references(() => users.id, { onDelete: "cascade" })
      .notNull(),
    role: varchar("role", { length: 60 }).notNull(),
  },
  (table) => ({
    userRolesPk: primaryKey({ columns: [table.userId, table.role] }),
  }),
);

/**
 * user_temporary_roles
 *
 * Time-boxed role grants. A grant is active while
 * `starts_at <= now < ends_at`.
 */
export const userTemporaryRoles = pgTable(
  "user_temporary_roles",
  {
    id: idWithTag("temp_role"),
    userId: idRef("user_id")
      .references(() => users.id, { onDelete: "cascade" })
      .notNull(),
    role: varchar("role", { length: 60 }).notNull(),
    startsAt: timestamp("starts_at", { withTimezone: true }).notNull(),
    endsAt: timestamp("ends_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    userTemporaryRolesUserRoleIdx: index("user_temporary_roles_user_role_idx").on(
      table.userId,
      table.role,
    ),
    userTemporaryRolesWindowIdx: index("user_temporary_roles_window_idx").on(
      table.startsAt,
      table.endsAt,
    ),
    userTemporaryRolesWindowCheck: check(
      "user_temporary_roles_window_check",
      sql`"starts_at" < "ends_at"`,
    ),
  }),
);

export type UserRole = typeof userRoles.$inferSelect;
export type UserTemporaryRole = typeof userTemporaryRoles.$inferSelect;
