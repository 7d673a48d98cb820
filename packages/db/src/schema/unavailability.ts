import { sql } from "drizzle-orm";
import { check, index } from "drizzle-orm/pg-core";
import { date, pgTable, varchar } from "drizzle-orm/pg-core";
import { idRef, idWithTag, withTimestamps } from "./_common";
import { users } from "./users";

/**
 * unavailability_windows
 *
 * Leave, medical or dispensation windows. Owned by leave management;
 * the allocator only reads them.
 *
 * Both bounds are inclusive calendar dates (`YYYY-MM-DD`).
 */
export const unavailabilityWindows = pgTable(
  "unavailability_windows",
  {
    id: idWithTag("unavailability"),
    userId: idRef("user_id")
      .references(() => users.id, { onDelete: "cascade" })
      .notNull(),
    startsOn: date("starts_on", { mode: "string" }).notNull(),
    endsOn: date("ends_on", { mode: "string" }).notNull(),
    reason: varchar("reason", { length: 500 }),
    ...withTimestamps(),
  },
  (table) => ({
    unavailabilityUserIdx: index("unavailability_windows_user_idx").on(table.userId),
    unavailabilityRangeIdx: index("unavailability_windows_range_idx").on(
      table.startsOn,
      table.endsOn,
    ),
    unavailabilityRangeCheck: check(
      "unavailability_windows_range_check",
      sql`"starts_on" <= "ends_on"`,
    ),
  }),
);

export type UnavailabilityWindow = typeof unavailabilityWindows.$inferSelect;
export type NewUnavailabilityWindow = typeof unavailabilityWindows.$inferInsert;
