import { RosterError } from './errors.js'
import type { RosterUnitOfWork } from './store.js'
import {
  fairnessCount,
  type DutyType,
  type GenderRestriction,
  type Post,
  type RosterPerson,
  type UnavailabilityWindow,
} from './types.js'

/**
 * Parse a post's `eligibleYears` column (`"1, 2"`) into a set of years.
 * Blank segments are ignored; anything non-numeric is dropped.
 */
export function parseEligibleYears(value: string): Set<number> {
  const years = new Set<number>()
  for (const segment of value.split(',')) {
    const trimmed = segment.trim()
    if (!/^\d+$/.test(trimmed)) continue
    years.add(Number(trimmed))
  }
  return years
}

export function postAcceptsYear(post: Pick<Post, 'eligibleYears'>, year: number): boolean {
  return parseEligibleYears(post.eligibleYears).has(year)
}

export function matchesGenderRestriction(
  restriction: GenderRestriction,
  gender: RosterPerson['gender'],
): boolean {
  return restriction === 'Mixed' || restriction === gender
}

export function isUnavailableOn(
  windows: Pick<UnavailabilityWindow, 'startsOn' | 'endsOn'>[],
  date: string,
): boolean {
  return windows.some((window) => window.startsOn <= date && date <= window.endsOn)
}

/**
 * Fairness ranking: people owing punishment duties first, then whoever has
 * done the fewest duties of this type, then account id for a stable order.
 */
export function compareCandidates(dutyType: DutyType) {
  return (left: RosterPerson, right: RosterPerson): number => {
    if (left.punishmentBalance !== right.punishmentBalance) {
      return right.punishmentBalance - left.punishmentBalance
    }
    const leftCount = fairnessCount(left, dutyType)
    const rightCount = fairnessCount(right, dutyType)
    if (leftCount !== rightCount) {
      return leftCount - rightCount
    }
    if (left.id === right.id) return 0
    return left.id < right.id ? -1 : 1
  }
}

export function assertPunishmentBalance(person: RosterPerson): void {
  if (person.punishmentBalance < 0) {
    throw new RosterError(
      'INVALID_PUNISHMENT_BALANCE',
      `Punishment balance of ${person.name || person.id} is negative.`,
      { userId: person.id, punishmentBalance: person.punishmentBalance },
    )
  }
}

export type CandidatePoolInput = {
  post: Pick<Post, 'genderRestriction'>
  date: string
  dutyType: DutyType
  people: RosterPerson[]
  unavailability: Pick<UnavailabilityWindow, 'userId' | 'startsOn' | 'endsOn'>[]
}

/**
 * Ranked candidate pool for one post on one date.
 *
 * Seniority and fatigue are not applied here; the selector checks those per
 * candidate so the first passing person in this order wins.
 */
export function buildCandidatePool(input: CandidatePoolInput): RosterPerson[] {
  const unavailable = new Set(
    input.unavailability
      .filter((window) => isUnavailableOn([window], input.date))
      .map((window) => window.userId),
  )

  const pool = input.people.filter(
    (person) =>
      matchesGenderRestriction(input.post.genderRestriction, person.gender) &&
      !unavailable.has(person.id),
  )
  pool.forEach(assertPunishmentBalance)

  return pool.sort(compareCandidates(input.dutyType))
}

/** Read the current people and unavailability through `uow` and rank them. */
export async function loadCandidatePool(
  uow: RosterUnitOfWork,
  post: Pick<Post, 'genderRestriction'>,
  date: string,
  dutyType: DutyType,
): Promise<RosterPerson[]> {
  const [people, unavailability] = await Promise.all([
    uow.listPeople(),
    uow.listUnavailabilityOn(date),
  ])
  return buildCandidatePool({ post, date, dutyType, people, unavailability })
}
