import { text, timestamp } from 'drizzle-orm/pg-core'
import { generateId, type IdTag } from '../id'

/** Row creation timestamp (UTC timestamptz). */
export const createdAt = () => timestamp('created_at', { withTimezone: true }).defaultNow().notNull()

/** Last update timestamp (application should refresh on mutation). */
export const updatedAt = () =>
  timestamp('updated_at', { withTimezone: true })
    .defaultNow()
    .$onUpdate(() => new Date())
    .notNull()

/** Text FK helper for tagged KSUID ids and account codes. */
export const idRef = (name: string) => text(name)

/** Primary key helper using tagged KSUID generation. */
export const idWithTag = (tag: IdTag) => idRef('id').primaryKey().$defaultFn(() => generateId(tag))

/**
 * Timestamp pair shared by every mutable roster table.
 */
export const withTimestamps = () => ({
  createdAt: createdAt(),
  updatedAt: updatedAt(),
})
