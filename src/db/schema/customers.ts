/**
 * Customers schema (SQLite):
 *   ✓ integer (autoincrement) / text / timestamp
 *   ✓ unique email index
 *   ✓ join date defaulting to creation time
 */

import { sql } from 'drizzle-orm'
import { integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core'

export const customers = sqliteTable(
  'customers',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    firstName: text('first_name', { length: 50 }).notNull(),
    lastName: text('last_name', { length: 50 }).notNull(),
    email: text('email', { length: 100 }).notNull(),
    joinDate: integer('join_date', { mode: 'timestamp' })
      .notNull()
      .default(sql`(unixepoch())`),
  },
  (t) => [uniqueIndex('customers_email_unique').on(t.email)]
)

export type Customer = typeof customers.$inferSelect
export type NewCustomer = typeof customers.$inferInsert
