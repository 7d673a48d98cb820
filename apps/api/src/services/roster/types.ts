import type {
  Allocation,
  Post,
  RosterDay,
  SwapDebt,
  SwapRequest,
  UnavailabilityWindow,
  User,
} from '@escala/db'
import type { DutyType } from '@escala/schema'

export type { Allocation, Post, RosterDay, SwapDebt, SwapRequest, UnavailabilityWindow }
export type { DutyType, GenderRestriction, RosterDayStatus, SwapStatus } from '@escala/schema'

/** Candidate view of an account: identity plus fairness bookkeeping. */
export type RosterPerson = Pick<
  User,
  | 'id'
  | 'name'
  | 'gender'
  | 'classLabel'
  | 'year'
  | 'normalDuties'
  | 'weekendDuties'
  | 'punishmentBalance'
>

/** Fields of a person the engine is allowed to move up or down. */
export type PersonCounter = 'normalDuties' | 'weekendDuties' | 'punishmentBalance'

export type PersonDelta = Partial<Record<PersonCounter, number>>

/**
 * Fairness counter selected by duty type.
 *
 * Two variants only; adding a duty type is a compile error here rather than a
 * string typo in a query.
 */
export const FAIRNESS_COUNTER = {
  RN: 'normalDuties',
  RD: 'weekendDuties',
} as const satisfies Record<DutyType, PersonCounter>

export type FairnessCounter = (typeof FAIRNESS_COUNTER)[DutyType]

export function fairnessCount(person: RosterPerson, dutyType: DutyType): number {
  return person[FAIRNESS_COUNTER[dutyType]]
}

export function fairnessDelta(dutyType: DutyType, amount: number): PersonDelta {
  const delta: PersonDelta = {}
  delta[FAIRNESS_COUNTER[dutyType]] = amount
  return delta
}

/** Clock seam so "today" and response stamps are deterministic in tests. */
export type Clock = () => Date
