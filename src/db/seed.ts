import { count } from 'drizzle-orm'
import type { StorefrontDatabase } from './client'
import { customers, orderItems, orders, products } from './schema'
import { seedCustomers, seedOrderItems, seedOrders, seedProducts } from './seed-data'

export interface SeedResult {
  skipped: boolean
  customers: number
  products: number
  orders: number
  orderItems: number
}

/**
 * Inserts the sample dataset in one transaction.
 * Does nothing when the customers table already has rows.
 */
export function seedDatabase(db: StorefrontDatabase): SeedResult {
  const [{ existing }] = db.select({ existing: count() }).from(customers).all()
  if (existing > 0) {
    return { skipped: true, customers: 0, products: 0, orders: 0, orderItems: 0 }
  }

  db.transaction((tx) => {
    tx.insert(customers).values(seedCustomers).run()
    tx.insert(products).values(seedProducts).run()
    tx.insert(orders).values(seedOrders).run()
    tx.insert(orderItems).values(seedOrderItems).run()
  })

  return {
    skipped: false,
    customers: seedCustomers.length,
    products: seedProducts.length,
    orders: seedOrders.length,
    orderItems: seedOrderItems.length,
  }
}
