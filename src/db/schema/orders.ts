/**
 * Orders schema (SQLite):
 *   ✓ Multiple foreign keys to different tables
 *   ✓ Cross-file references (customers, products)
 *   ✓ Free-text status with a default
 *   ✓ Unit price captured on the order item
 */

import { sql } from 'drizzle-orm'
import { check, index, integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core'
import { customers } from './customers'
import { products } from './products'

// ── Orders ──────────────────────────────────────────────────────

export const orders = sqliteTable(
  'orders',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    customerId: integer('customer_id')
      .notNull()
      .references(() => customers.id),
    orderDate: integer('order_date', { mode: 'timestamp' })
      .notNull()
      .default(sql`(unixepoch())`),
    status: text('status', { length: 20 }).notNull().default('Pending'),
  },
  (t) => [index('idx_orders_customer_id').on(t.customerId)]
)

// ── Order Items ─────────────────────────────────────────────────

export const orderItems = sqliteTable(
  'order_items',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    orderId: integer('order_id')
      .notNull()
      .references(() => orders.id),
    productId: integer('product_id')
      .notNull()
      .references(() => products.id),
    quantity: integer('quantity').notNull().default(1),
    // Price at the time the item was ordered, not the current product price
    unitPrice: real('unit_price').notNull(),
  },
  (t) => [check('order_items_quantity_positive', sql`${t.quantity} > 0`)]
)

export type Order = typeof orders.$inferSelect
export type NewOrder = typeof orders.$inferInsert
export type OrderItem = typeof orderItems.$inferSelect
export type NewOrderItem = typeof orderItems.$inferInsert
