import { index, pgTable, text, timestamp } from "drizzle-orm/pg-core";
import { idRef, withTimestamps } from "./_common";
import { users } from "./users";

/*
 * Better Auth tables. Column names follow the adapter's field names; ids are
 * generated by Better Auth itself, so none of these use `idWithTag`.
 */

/** One row per login session; `token` is what the session cookie carries. */
export const sessions = pgTable(
  "sessions",
  {
    id: text("id").primaryKey(),
    userId: idRef("user_id")
      .references(() => users.id, { onDelete: "cascade" })
      .notNull(),
    token: text("token").notNull().unique(),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
    ipAddress: text("ip_address"),
    userAgent: text("user_agent"),
    ...withTimestamps(),
  },
  (table) => ({
    sessionsUserIdx: index("sessions_user_idx").on(table.userId),
  }),
);

/**
 * Credential links. Email/password sign-in keeps the password hash here
 * (`providerId = 'credential'`), never on `users`.
 */
export const accounts = pgTable(
  "accounts",
  {
    id: text("id").primaryKey(),
    userId: idRef("user_id")
      .references(() => users.id, { onDelete: "cascade" })
      .notNull(),
    accountId: text("account_id").notNull(),
    providerId: text("provider_id").notNull(),
    password: text("password"),
    accessToken: text("access_token"),
    refreshToken: text("refresh_token"),
    idToken: text("id_token"),
    accessTokenExpiresAt: timestamp("access_token_expires_at", { withTimezone: true }),
    refreshTokenExpiresAt: timestamp("refresh_token_expires_at", { withTimezone: true }),
    scope: text("scope"),
    ...withTimestamps(),
  },
  (table) => ({
    accountsUserIdx: index("accounts_user_idx").on(table.userId),
  }),
);

/** Short-lived tokens for password resets and email checks. */
export const verifications = pgTable(
  "verifications",
  {
    id: text("id").primaryKey(),
    identifier: text("identifier").notNull(),
    value: text("value").notNull(),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
    ...withTimestamps(),
  },
  (table) => ({
    verificationsIdentifierIdx: index("verifications_identifier_idx").on(table.identifier),
  }),
);

/** Passed to the Drizzle adapter together with `users`. */
export const authSchema = { sessions, accounts, verifications };
