/**
 * Products schema (SQLite):
 *   ✓ real / integer types
 *   ✓ check constraint on price
 *   ✓ secondary index for name lookups
 */

import { sql } from 'drizzle-orm'
import { check, index, integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core'

export const products = sqliteTable(
  'products',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    name: text('name', { length: 100 }).notNull(),
    category: text('category', { length: 50 }).notNull(),
    price: real('price').notNull(),
    stockQuantity: integer('stock_quantity').notNull().default(0),
  },
  (t) => [
    index('idx_products_name').on(t.name),
    check('products_price_non_negative', sql`${t.price} >= 0`),
  ]
)

export type Product = typeof products.$inferSelect
export type NewProduct = typeof products.$inferInsert
