/**
 * Report query tests against the seeded sample dataset
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { eq } from 'drizzle-orm'
import { openDatabase, type StorefrontConnection } from '../src/db/client'
import { customers, orders, products } from '../src/db/schema'
import { seedOrderItems } from '../src/db/seed-data'
import {
  averageRevenuePerCustomer,
  categoriesAboveSalesThreshold,
  customerOrderStats,
  customersWithoutOrders,
  explainQueryPlan,
  inventoryValueByCategory,
  listIndexes,
  listOrderSummaries,
  listProductsByPrice,
  productsInDeliveredOrders,
} from '../src/reports/queries'
import { openSeededDatabase } from './helpers'

describe('reports', () => {
  let connection: StorefrontConnection

  beforeEach(() => {
    connection = openSeededDatabase()
  })

  afterEach(() => {
    connection.close()
  })

  describe('listProductsByPrice', () => {
    it('lists products above 50, most expensive first', async () => {
      expect(await listProductsByPrice(connection.db)).toEqual([
        { id: 4, name: 'Standing Desk', category: 'Furniture', price: 349 },
        { id: 5, name: 'Ergonomic Chair', category: 'Furniture', price: 250 },
        { id: 3, name: 'Noise-Cancelling Headphones', category: 'Electronics', price: 199 },
        { id: 2, name: 'Mechanical Keyboard', category: 'Electronics', price: 89.5 },
      ])
    })

    it('applies an upper bound and ascending order', async () => {
      const rows = await listProductsByPrice(connection.db, {
        minPrice: 20,
        maxPrice: 199,
        direction: 'asc',
      })

      expect(rows.map((p) => p.id)).toEqual([1, 2, 3])
    })

    it('treats the lower bound as exclusive', async () => {
      const rows = await listProductsByPrice(connection.db, { minPrice: 349 })

      expect(rows).toEqual([])
    })
  })

  describe('inventoryValueByCategory', () => {
    it('sums price times stock per category', async () => {
      expect(await inventoryValueByCategory(connection.db)).toEqual([
        { category: 'Electronics', productCount: 3, unitsInStock: 235, inventoryValue: 14095 },
        { category: 'Furniture', productCount: 2, unitsInStock: 25, inventoryValue: 7240 },
        { category: 'Stationery', productCount: 1, unitsInStock: 300, inventoryValue: 3825 },
      ])
    })
  })

  describe('customerOrderStats', () => {
    it('aggregates orders and item revenue per purchasing customer', async () => {
      expect(await customerOrderStats(connection.db)).toEqual([
        {
          customerId: 2,
          firstName: 'Liam',
          lastName: 'Ortiz',
          orderCount: 2,
          totalRevenue: 528,
          averageItemValue: 264,
        },
        {
          customerId: 3,
          firstName: 'Priya',
          lastName: 'Nair',
          orderCount: 1,
          totalRevenue: 500,
          averageItemValue: 500,
        },
        {
          customerId: 1,
          firstName: 'Maya',
          lastName: 'Chen',
          orderCount: 2,
          totalRevenue: 384.5,
          averageItemValue: 96.125,
        },
        {
          customerId: 4,
          firstName: 'Jonas',
          lastName: 'Berg',
          orderCount: 1,
          totalRevenue: 152.5,
          averageItemValue: 76.25,
        },
      ])
    })
  })

  describe('productsInDeliveredOrders', () => {
    it('returns products from delivered orders', async () => {
      expect(await productsInDeliveredOrders(connection.db)).toEqual([
        { id: 1, name: 'Wireless Mouse', category: 'Electronics', price: 25 },
        { id: 2, name: 'Mechanical Keyboard', category: 'Electronics', price: 89.5 },
        { id: 4, name: 'Standing Desk', category: 'Furniture', price: 349 },
        { id: 6, name: 'Notebook Set', category: 'Stationery', price: 12.75 },
      ])
    })

    it('filters on another status', async () => {
      const rows = await productsInDeliveredOrders(connection.db, { status: 'Cancelled' })

      expect(rows.map((p) => p.name)).toEqual(['Mechanical Keyboard'])
    })

    it('matches the status exactly', async () => {
      expect(await productsInDeliveredOrders(connection.db, { status: 'delivered' })).toEqual([])
    })
  })

  describe('customersWithoutOrders', () => {
    it('finds customers with no orders', async () => {
      expect(await customersWithoutOrders(connection.db)).toEqual([
        { id: 5, firstName: 'Sofia', lastName: 'Rossi', email: 'sofia.rossi@example.com' },
      ])
    })

    it('drops a customer once an order exists', async () => {
      connection.db.insert(orders).values({ customerId: 5 }).run()

      expect(await customersWithoutOrders(connection.db)).toEqual([])
    })
  })

  describe('categoriesAboveSalesThreshold', () => {
    it('keeps categories selling more than 500', async () => {
      expect(await categoriesAboveSalesThreshold(connection.db)).toEqual([
        { category: 'Furniture', totalSales: 849 },
        { category: 'Electronics', totalSales: 537.5 },
      ])
    })

    it('includes every category at threshold 0', async () => {
      const rows = await categoriesAboveSalesThreshold(connection.db, { threshold: 0 })

      expect(rows).toEqual([
        { category: 'Furniture', totalSales: 849 },
        { category: 'Electronics', totalSales: 537.5 },
        { category: 'Stationery', totalSales: 178.5 },
      ])
    })

    it('treats the threshold as exclusive', async () => {
      expect(await categoriesAboveSalesThreshold(connection.db, { threshold: 849 })).toEqual([])
    })
  })

  describe('averageRevenuePerCustomer', () => {
    it('divides total item revenue by the four purchasing customers', async () => {
      const result = await averageRevenuePerCustomer(connection.db)
      const itemRevenue = seedOrderItems.reduce(
        (total, item) => total + (item.quantity ?? 1) * item.unitPrice,
        0
      )

      expect(result).toEqual({
        purchasingCustomers: 4,
        totalRevenue: 1565,
        averageRevenuePerCustomer: 391.25,
      })
      expect(result.averageRevenuePerCustomer).toBe(itemRevenue / 4)
    })

    it('returns zeros without orders', async () => {
      const empty = openDatabase()
      try {
        expect(await averageRevenuePerCustomer(empty.db)).toEqual({
          purchasingCustomers: 0,
          totalRevenue: 0,
          averageRevenuePerCustomer: 0,
        })
      } finally {
        empty.close()
      }
    })
  })

  describe('listOrderSummaries', () => {
    it('returns one row per order from the view', async () => {
      const rows = await listOrderSummaries(connection.db)

      expect(rows[0]).toEqual({
        orderId: 1,
        customerId: 1,
        orderDate: new Date('2024-01-15T00:00:00Z'),
        status: 'Delivered',
        firstName: 'Maya',
        lastName: 'Chen',
        email: 'maya.chen@example.com',
        lineCount: 2,
        totalQuantity: 3,
        orderTotal: 134.5,
      })
      expect(rows.map((o) => [o.orderId, o.lineCount, o.totalQuantity, o.orderTotal])).toEqual([
        [1, 2, 3, 134.5],
        [2, 1, 1, 349],
        [3, 2, 5, 250],
        [4, 1, 2, 500],
        [5, 2, 11, 152.5],
        [6, 1, 2, 179],
      ])
    })

    it('leaves out orders without items', async () => {
      connection.db.insert(orders).values({ customerId: 5 }).run()

      expect(await listOrderSummaries(connection.db)).toHaveLength(6)
    })
  })

  describe('indexes', () => {
    it('lists the user-defined indexes', async () => {
      expect(await listIndexes(connection.db)).toEqual([
        { name: 'customers_email_unique', table: 'customers' },
        { name: 'idx_orders_customer_id', table: 'orders' },
        { name: 'idx_products_name', table: 'products' },
      ])
    })

    it('uses the customer index for order lookups', async () => {
      const plan = await explainQueryPlan(
        connection.db,
        connection.db.select().from(orders).where(eq(orders.customerId, 1))
      )

      expect(plan.join('\n')).toContain('idx_orders_customer_id')
    })

    it('uses the name index for product lookups', async () => {
      const plan = await explainQueryPlan(
        connection.db,
        connection.db.select().from(products).where(eq(products.name, 'Standing Desk'))
      )

      expect(plan.join('\n')).toContain('idx_products_name')
    })

    it('uses the unique index for email lookups', async () => {
      const plan = await explainQueryPlan(
        connection.db,
        connection.db.select().from(customers).where(eq(customers.email, 'maya.chen@example.com'))
      )

      expect(plan.join('\n')).toContain('customers_email_unique')
    })
  })
})
