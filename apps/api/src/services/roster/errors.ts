import type { ZodError } from 'zod'

export type RosterErrorCategory =
  | 'validation'
  | 'state_conflict'
  | 'staffing'
  | 'fatigue'
  | 'authorization'
  | 'not_found'

export type RosterErrorCode =
  | 'VALIDATION_ERROR'
  | 'DAY_ALREADY_PUBLISHED'
  | 'NOTHING_TO_PUBLISH'
  | 'DAY_NOT_FOUND'
  | 'DAY_NOT_PUBLISHED'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'SWAP_ALREADY_RESOLVED'
  | 'SWAP_NOT_PENDING'
  | 'SWAP_ALREADY_OPEN'
  | 'STALE_SWAP'
  | 'ALLOCATION_NOT_UPCOMING'
  | 'UNFILLED_POST'
  | 'PERIOD_GENERATION_FAILED'
  | 'FATIGUE_VIOLATION'
  | 'INVALID_PUNISHMENT_BALANCE'

export type RosterErrorStatus = 400 | 403 | 404 | 409 | 422 | 500

const ERROR_SHAPES: Record<RosterErrorCode, { status: RosterErrorStatus; category: RosterErrorCategory }> = {
  VALIDATION_ERROR: { status: 400, category: 'validation' },
  DAY_ALREADY_PUBLISHED: { status: 409, category: 'state_conflict' },
  NOTHING_TO_PUBLISH: { status: 409, category: 'state_conflict' },
  DAY_NOT_FOUND: { status: 404, category: 'not_found' },
  DAY_NOT_PUBLISHED: { status: 409, category: 'state_conflict' },
  NOT_FOUND: { status: 404, category: 'not_found' },
  FORBIDDEN: { status: 403, category: 'authorization' },
  SWAP_ALREADY_RESOLVED: { status: 409, category: 'state_conflict' },
  SWAP_NOT_PENDING: { status: 409, category: 'state_conflict' },
  SWAP_ALREADY_OPEN: { status: 409, category: 'state_conflict' },
  STALE_SWAP: { status: 409, category: 'state_conflict' },
  ALLOCATION_NOT_UPCOMING: { status: 409, category: 'state_conflict' },
  UNFILLED_POST: { status: 422, category: 'staffing' },
  PERIOD_GENERATION_FAILED: { status: 422, category: 'staffing' },
  FATIGUE_VIOLATION: { status: 409, category: 'fatigue' },
  INVALID_PUNISHMENT_BALANCE: { status: 500, category: 'state_conflict' },
}

/**
 * Structured roster error.
 *
 * Every rule the engine enforces fails with one of these, carrying enough
 * detail (post, date, person) for an operator to act. Store/driver failures
 * are never wrapped into a RosterError.
 */
export class RosterError extends Error {
  code: RosterErrorCode
  status: RosterErrorStatus
  category: RosterErrorCategory
  details?: Record<string, unknown>

  constructor(
    code: RosterErrorCode,
    message: string,
    details?: Record<string, unknown>,
    category?: RosterErrorCategory,
  ) {
    super(message)
    this.name = 'RosterError'
    this.code = code
    this.status = ERROR_SHAPES[code].status
    this.category = category ?? ERROR_SHAPES[code].category
    this.details = details
  }
}

export function isRosterError(error: unknown): error is RosterError {
  return error instanceof RosterError
}

export function validationError(error: ZodError, message = 'Invalid input.'): RosterError {
  return new RosterError('VALIDATION_ERROR', message, error.flatten())
}
