import { pgEnum } from "drizzle-orm/pg-core";

/**
 * Central enum registry for the roster engine.
 *
 * Why this file exists:
 * - Keeps status/value vocabularies consistent across modules.
 * - Prevents drift between API layer and DB layer.
 * - Makes migrations deterministic when state machines evolve.
 *
 * How to extend safely:
 * - Add new values only after API/state-machine support exists.
 * - Avoid renaming existing values; add + deprecate instead.
 */

// -----------------------------------------------------------------------------
// People + posts
// -----------------------------------------------------------------------------

/** Gender recorded on a person account. */
export const genderEnum = pgEnum("gender", ["M", "F"]);

/** Gender restriction declared by a duty post. `Mixed` accepts everyone. */
export const postGenderRestrictionEnum = pgEnum("post_gender_restriction", [
  "M",
  "F",
  "Mixed",
]);

// -----------------------------------------------------------------------------
// Roster days
// -----------------------------------------------------------------------------

/**
 * Duty type of a roster day.
 *
 * `RN` is the normal routine (weekdays), `RD` the weekend/holiday routine.
 * Each type has its own fairness counter on the person row.
 */
export const dutyTypeEnum = pgEnum("duty_type", ["RN", "RD"]);

/**
 * Roster day lifecycle.
 *
 * Draft -> Published (publication), Published -> Draft (errata).
 * Only Draft days may be regenerated or receive new swap requests.
 */
export const rosterDayStatusEnum = pgEnum("roster_day_status", [
  "Draft",
  "Published",
]);

// -----------------------------------------------------------------------------
// Swaps
// -----------------------------------------------------------------------------

/**
 * Swap request lifecycle.
 *
 * Pending -> AwaitingScheduler (substitute accepted) -> Approved | Rejected.
 * Pending -> Rejected when the substitute declines.
 */
export const swapStatusEnum = pgEnum("swap_status", [
  "Pending",
  "AwaitingScheduler",
  "Approved",
  "Rejected",
]);

/** One-way swap debt state. */
export const swapDebtStatusEnum = pgEnum("swap_debt_status", [
  "pending",
  "paid",
]);
