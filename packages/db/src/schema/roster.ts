import { sql } from "drizzle-orm";
import { check, index, uniqueIndex } from "drizzle-orm/pg-core";
import { boolean, date, pgTable, timestamp } from "drizzle-orm/pg-core";
import { createdAt, idRef, idWithTag, withTimestamps } from "./_common";
import { dutyTypeEnum, rosterDayStatusEnum } from "./enums";
import { posts } from "./posts";
import { users } from "./users";

/**
 * roster_days
 *
 * One header row per calendar date. The date itself is the primary key,
 * which makes the header upsert the serialization point for regeneration.
 */
export const rosterDays = pgTable(
  "roster_days",
  {
    date: date("date", { mode: "string" }).primaryKey(),
    dutyType: dutyTypeEnum("duty_type").notNull(),
    status: rosterDayStatusEnum("status").default("Draft").notNull(),

    /** Last publication time; kept after errata for audit. */
    publishedAt: timestamp("published_at", { withTimezone: true }),

    ...withTimestamps(),
  },
  (table) => ({
    rosterDaysStatusIdx: index("roster_days_status_idx").on(table.status, table.date),
  }),
);

/**
 * allocations
 *
 * "This person fills this post on this date."
 *
 * Created by the day allocator, re-owned by swap approval, deleted only when
 * the day is regenerated.
 */
export const allocations = pgTable(
  "allocations",
  {
    id: idWithTag("allocation"),
    userId: idRef("user_id")
      .references(() => users.id)
      .notNull(),
    postId: idRef("post_id")
      .references(() => posts.id)
      .notNull(),
    date: date("date", { mode: "string" })
      .references(() => rosterDays.date)
      .notNull(),

    /** Debt-repayment duty: consumed a punishment, not a fairness counter. */
    isPunishment: boolean("is_punishment").default(false).notNull(),

    /**
     * Whose punishment balance this duty consumed. Stays put when a swap
     * moves the allocation, so regeneration refunds the right person.
     */
    punishedUserId: idRef("punished_user_id").references(() => users.id),

    createdAt: createdAt(),
  },
  (table) => ({
    allocationsPostDateUnique: uniqueIndex("allocations_post_date_unique").on(
      table.postId,
      table.date,
    ),
    allocationsUserDateUnique: uniqueIndex("allocations_user_date_unique").on(
      table.userId,
      table.date,
    ),
    allocationsDateIdx: index("allocations_date_idx").on(table.date),
    allocationsPunishedUserCheck: check(
      "allocations_punished_user_check",
      sql`("is_punishment" AND "punished_user_id" IS NOT NULL) OR (NOT "is_punishment" AND "punished_user_id" IS NULL)`,
    ),
  }),
);

export type RosterDay = typeof rosterDays.$inferSelect;
export type NewRosterDay = typeof rosterDays.$inferInsert;
export type Allocation = typeof allocations.$inferSelect;
export type NewAllocation = typeof allocations.$inferInsert;
