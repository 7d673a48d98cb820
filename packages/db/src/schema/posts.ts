import { sql } from "drizzle-orm";
import { check, index, uniqueIndex } from "drizzle-orm/pg-core";
import { integer, pgTable, varchar } from "drizzle-orm/pg-core";
import { idWithTag, withTimestamps } from "./_common";
import { postGenderRestrictionEnum } from "./enums";

/**
 * posts
 *
 * Duty positions filled once per roster day.
 * Reference data: maintained by admin tooling, read by the allocator.
 */
export const posts = pgTable(
  "posts",
  {
    id: idWithTag("post"),
    name: varchar("name", { length: 160 }).notNull(),

    genderRestriction: postGenderRestrictionEnum("gender_restriction")
      .default("Mixed")
      .notNull(),

    /**
     * Comma-separated seniority years accepted by this post, e.g. `"1,2"`.
     * Membership is strict: a year outside the set is never eligible.
     */
    eligibleYears: varchar("eligible_years", { length: 60 }).notNull(),

    /** Ordering weight. Heavier posts are staffed (and listed) first. */
    priorityWeight: integer("priority_weight").default(1).notNull(),

    ...withTimestamps(),
  },
  (table) => ({
    postsNameUnique: uniqueIndex("posts_name_unique").on(table.name),
    postsOrderIdx: index("posts_order_idx").on(table.priorityWeight, table.name),
    postsEligibleYearsCheck: check(
      "posts_eligible_years_check",
      sql`"eligible_years" ~ '^ *[0-9]+ *(, *[0-9]+ *)*$'`,
    ),
  }),
);

export type Post = typeof posts.$inferSelect;
export type NewPost = typeof posts.$inferInsert;
