import { sql } from "drizzle-orm";
import { check, index } from "drizzle-orm/pg-core";
import { pgTable, text, timestamp } from "drizzle-orm/pg-core";
import { createdAt, idRef, idWithTag } from "./_common";
import { swapDebtStatusEnum, swapStatusEnum } from "./enums";
import { allocations } from "./roster";
import { users } from "./users";

/**
 * swap_requests
 *
 * Requester asks a substitute to take over one allocation. The substitute
 * consents (or declines), then a scheduler approves and the allocation
 * changes owner.
 *
 * Allocation references are nulled when a Draft day is regenerated; the row
 * stays as history.
 */
export const swapRequests = pgTable(
  "swap_requests",
  {
    id: idWithTag("swap"),
    requesterId: idRef("requester_id")
      .references(() => users.id)
      .notNull(),
    substituteId: idRef("substitute_id")
      .references(() => users.id)
      .notNull(),
    allocationId: idRef("allocation_id").references(() => allocations.id, {
      onDelete: "set null",
    }),

    /** Optional allocation of the substitute handed to the requester in return. */
    counterAllocationId: idRef("counter_allocation_id").references(() => allocations.id, {
      onDelete: "set null",
    }),

    status: swapStatusEnum("status").default("Pending").notNull(),
    reason: text("reason"),
    createdAt: createdAt(),
    respondedAt: timestamp("responded_at", { withTimezone: true }),
  },
  (table) => ({
    swapRequestsSubstituteStatusIdx: index("swap_requests_substitute_status_idx").on(
      table.substituteId,
      table.status,
    ),
    swapRequestsAllocationIdx: index("swap_requests_allocation_idx").on(table.allocationId),
    swapRequestsStatusIdx: index("swap_requests_status_idx").on(table.status),
    swapRequestsDistinctPeopleCheck: check(
      "swap_requests_distinct_people_check",
      sql`"requester_id" <> "substitute_id"`,
    ),
  }),
);

/**
 * swap_debts
 *
 * One-way swaps leave the requester owing the substitute a duty. A later
 * approved swap in the opposite direction settles the oldest pending debt.
 */
export const swapDebts = pgTable(
  "swap_debts",
  {
    id: idWithTag("swap_debt"),
    debtorId: idRef("debtor_id")
      .references(() => users.id)
      .notNull(),
    creditorId: idRef("creditor_id")
      .references(() => users.id)
      .notNull(),
    originSwapId: idRef("origin_swap_id").references(() => swapRequests.id),
    settledBySwapId: idRef("settled_by_swap_id").references(() => swapRequests.id),
    status: swapDebtStatusEnum("status").default("pending").notNull(),
    createdAt: createdAt(),
    paidAt: timestamp("paid_at", { withTimezone: true }),
  },
  (table) => ({
    swapDebtsPairStatusIdx: index("swap_debts_pair_status_idx").on(
      table.debtorId,
      table.creditorId,
      table.status,
    ),
  }),
);

export type SwapRequest = typeof swapRequests.$inferSelect;
export type NewSwapRequest = typeof swapRequests.$inferInsert;
export type SwapDebt = typeof swapDebts.$inferSelect;
export type NewSwapDebt = typeof swapDebts.$inferInsert;
