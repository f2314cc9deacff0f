import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { count, eq } from 'drizzle-orm'
import type { StorefrontConnection } from '../src/db/client'
import { orders, products } from '../src/db/schema'
import { customersWithoutOrders } from '../src/reports/queries'
import { findOrder, placeOrder } from '../src/services/orders'
import { openSeededDatabase } from './helpers'

describe('orders service', () => {
  let connection: StorefrontConnection

  const orderCount = () => {
    const [row] = connection.db.select({ total: count() }).from(orders).all()
    return row.total
  }

  beforeEach(() => {
    connection = openSeededDatabase()
  })

  afterEach(() => {
    connection.close()
  })

  describe('findOrder', () => {
    it('loads an order with its customer and items', async () => {
      const order = await findOrder(connection.db, 1)

      expect(order?.status).toBe('Delivered')
      expect(order?.customer.email).toBe('maya.chen@example.com')
      expect(
        order?.items.map((item) => [item.product.name, item.quantity, item.unitPrice])
      ).toEqual([
        ['Wireless Mouse', 2, 22.5],
        ['Mechanical Keyboard', 1, 89.5],
      ])
    })

    it('returns undefined for a missing order', async () => {
      expect(await findOrder(connection.db, 999)).toBeUndefined()
    })
  })

  describe('placeOrder', () => {
    it('snapshots current product prices', async () => {
      const order = await placeOrder(connection.db, {
        customerId: 5,
        items: [
          { productId: 4, quantity: 1 },
          { productId: 6, quantity: 3 },
        ],
      })

      expect(order.id).toBe(7)
      expect(order.status).toBe('Pending')
      expect(order.customer.firstName).toBe('Sofia')
      expect(order.items.map((item) => [item.productId, item.quantity, item.unitPrice])).toEqual([
        [4, 1, 349],
        [6, 3, 12.75],
      ])
    })

    it('keeps the snapshot after the product price changes', async () => {
      const order = await placeOrder(connection.db, {
        customerId: 5,
        items: [{ productId: 4, quantity: 1 }],
      })

      connection.db.update(products).set({ price: 399 }).where(eq(products.id, 4)).run()

      const reloaded = await findOrder(connection.db, order.id)
      expect(reloaded?.items[0].unitPrice).toBe(349)
      expect(reloaded?.items[0].product.price).toBe(399)
    })

    it('stores an explicit status and date', async () => {
      const orderDate = new Date('2024-05-01T00:00:00Z')
      const order = await placeOrder(connection.db, {
        customerId: 1,
        status: 'Shipped',
        orderDate,
        items: [{ productId: 1, quantity: 2 }],
      })

      expect(order.status).toBe('Shipped')
      expect(order.orderDate).toEqual(orderDate)
    })

    it('removes the customer from the no-orders report', async () => {
      await placeOrder(connection.db, { customerId: 5, items: [{ productId: 1, quantity: 1 }] })

      expect(await customersWithoutOrders(connection.db)).toEqual([])
    })

    it('rejects an unknown customer without writing', async () => {
      await expect(
        placeOrder(connection.db, { customerId: 99, items: [{ productId: 1, quantity: 1 }] })
      ).rejects.toThrow('Customer 99 does not exist')
      expect(orderCount()).toBe(6)
    })

    it('rejects an unknown product without writing', async () => {
      await expect(
        placeOrder(connection.db, {
          customerId: 1,
          items: [
            { productId: 1, quantity: 1 },
            { productId: 42, quantity: 1 },
          ],
        })
      ).rejects.toThrow('Product 42 does not exist')
      expect(orderCount()).toBe(6)
    })

    it('rejects an empty item list', async () => {
      await expect(placeOrder(connection.db, { customerId: 1, items: [] })).rejects.toThrow(
        'Order for customer 1 has no items'
      )
    })

    it('rejects non-positive and fractional quantities', async () => {
      await expect(
        placeOrder(connection.db, { customerId: 1, items: [{ productId: 1, quantity: 0 }] })
      ).rejects.toThrow('Invalid quantity 0 for product 1')
      await expect(
        placeOrder(connection.db, { customerId: 1, items: [{ productId: 2, quantity: 1.5 }] })
      ).rejects.toThrow('Invalid quantity 1.5 for product 2')
      expect(orderCount()).toBe(6)
    })
  })
})
