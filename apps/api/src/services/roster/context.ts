import type { Logger } from '../../lib/logger.js'
import type { RosterReadModel, RosterStore } from './store.js'
import type { Clock } from './types.js'

/** Collaborators every roster operation receives. */
export type RosterContext = {
  store: RosterStore
  logger: Logger
  clock: Clock
}

export type RosterViewContext = {
  readModel: RosterReadModel
  clock: Clock
}
