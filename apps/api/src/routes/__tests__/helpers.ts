import { createApp } from '../../app'
import { silentLogger } from '../../lib/logger'
import type { IdentityResolver } from '../../middleware/auth'
import { createStaticRoleDirectory } from '../../services/roles'
import { createRosterEngine } from '../../services/roster/engine'
import type { RosterStore } from '../../services/roster/store'
import { fixedClock } from '../../services/__tests__/helpers/engine'
import type { MemoryRosterStore } from '../../services/__tests__/helpers/memory-roster-store'

export const SCHEDULER_ID = '9000'

/** Identity comes from an `x-test-user` header instead of a session cookie. */
export const headerIdentity: IdentityResolver = async (headers) => {
  const id = headers.get('x-test-user')
  return id ? { id } : null
}

export function buildTestApp(store: MemoryRosterStore, options: { writeStore?: RosterStore } = {}) {
  const engine = createRosterEngine({
    store: options.writeStore ?? store,
    readModel: store,
    clock: fixedClock,
  })
  return createApp({
    engine,
    logger: silentLogger,
    resolveIdentity: headerIdentity,
    roles: createStaticRoleDirectory({ [SCHEDULER_ID]: ['Scheduler'] }),
  })
}

export type TestApp = ReturnType<typeof buildTestApp>

export function call(
  app: TestApp,
  method: 'GET' | 'POST',
  path: string,
  options: { user?: string; body?: unknown } = {},
) {
  const headers: Record<string, string> = {}
  if (options.user) headers['x-test-user'] = options.user
  if (options.body !== undefined) headers['content-type'] = 'application/json'
  return app.request(path, {
    method,
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
  })
}
