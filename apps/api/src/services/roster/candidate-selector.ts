import { RosterError } from './errors.js'
import { isFatigued } from './fatigue.js'
import { parseEligibleYears } from './eligibility.js'
import type { RosterUnitOfWork } from './store.js'
import type { Post, RosterPerson } from './types.js'

/**
 * First-fit over an already ranked pool: the first person whose year the post
 * accepts and who is not fatigued on `date`. `null` when nobody qualifies.
 */
export async function selectCandidate(
  uow: RosterUnitOfWork,
  post: Pick<Post, 'eligibleYears'>,
  date: string,
  pool: RosterPerson[],
): Promise<RosterPerson | null> {
  const years = parseEligibleYears(post.eligibleYears)

  for (const candidate of pool) {
    if (!years.has(candidate.year)) continue
    if (await isFatigued(uow, candidate.id, date)) continue
    return candidate
  }

  return null
}

export function unfilledPostError(post: Pick<Post, 'id' | 'name' | 'eligibleYears'>, date: string) {
  const requiredYears = Array.from(parseEligibleYears(post.eligibleYears)).sort((a, b) => a - b)
  return new RosterError(
    'UNFILLED_POST',
    `No eligible person for post "${post.name}" on ${date} (years ${requiredYears.join(', ') || 'none'}).`,
    {
      postId: post.id,
      postName: post.name,
      requiredYears,
      date,
    },
  )
}
