/**
 * Views schema (SQLite):
 *   ✓ Query-builder view over three tables
 *   ✓ Aggregated columns (aliased)
 */

import { eq, sql } from 'drizzle-orm'
import { sqliteView } from 'drizzle-orm/sqlite-core'
import { customers } from './customers'
import { orderItems, orders } from './orders'

// ── Order Summaries ─────────────────────────────────────────────
// One row per order that has at least one item.

export const orderSummaries = sqliteView('order_summaries').as((qb) =>
  qb
    .select({
      orderId: orders.id,
      customerId: orders.customerId,
      orderDate: orders.orderDate,
      status: orders.status,
      firstName: customers.firstName,
      lastName: customers.lastName,
      email: customers.email,
      lineCount: sql<number>`count(${orderItems.id})`.mapWith(Number).as('line_count'),
      totalQuantity: sql<number>`sum(${orderItems.quantity})`.mapWith(Number).as('total_quantity'),
      orderTotal: sql<number>`sum(${orderItems.quantity} * ${orderItems.unitPrice})`
        .mapWith(Number)
        .as('order_total'),
    })
    .from(orders)
    .innerJoin(customers, eq(customers.id, orders.customerId))
    .innerJoin(orderItems, eq(orderItems.orderId, orders.id))
    .groupBy(
      orders.id,
      orders.customerId,
      orders.orderDate,
      orders.status,
      customers.firstName,
      customers.lastName,
      customers.email
    )
)
