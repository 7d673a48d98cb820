import { randomUUID } from 'node:crypto'
import type { Context } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { isRosterError } from '../services/roster/errors.js'

export function requestMeta(c: Context) {
  return {
    requestId: c.get('requestId') ?? randomUUID(),
    timestamp: new Date().toISOString(),
  }
}

export function ok<T>(
  c: Context,
  data: T,
  status: ContentfulStatusCode = 200,
  extra?: Record<string, unknown>,
) {
  return c.json(
    {
      success: true,
      data,
      meta: requestMeta(c),
      ...(extra ?? {}),
    },
    status,
  )
}

export function fail(
  c: Context,
  code: string,
  message: string,
  status: ContentfulStatusCode = 400,
  details?: unknown,
) {
  return c.json(
    {
      success: false,
      error: {
        code,
        message,
        ...(details !== undefined ? { details } : {}),
      },
      meta: requestMeta(c),
    },
    status,
  )
}

/**
 * Run a roster operation and translate domain errors into the error envelope.
 * Anything that is not a RosterError is rethrown for `app.onError`.
 */
export async function respond<T>(
  c: Context,
  run: () => Promise<T>,
  status: ContentfulStatusCode = 200,
) {
  try {
    return ok(c, await run(), status)
  } catch (error) {
    if (isRosterError(error)) {
      return fail(c, error.code, error.message, error.status, {
        category: error.category,
        ...(error.details ?? {}),
      })
    }
    throw error
  }
}

/** Parse a JSON body; `null` when missing or malformed so schemas report it. */
export async function readJson(c: Context): Promise<unknown> {
  return c.req.json().catch(() => null)
}
