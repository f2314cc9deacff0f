import { eq, inArray } from 'drizzle-orm'
import type { StorefrontDatabase } from '../db/client'
import { customers, orderItems, orders, products } from '../db/schema'

export interface PlaceOrderItem {
  productId: number
  quantity: number
}

export interface PlaceOrderInput {
  customerId: number
  items: PlaceOrderItem[]
  // Defaults to the column default ('Pending')
  status?: string
  orderDate?: Date
}

export type OrderWithItems = NonNullable<Awaited<ReturnType<typeof findOrder>>>

export async function findOrder(db: StorefrontDatabase, orderId: number) {
  return db.query.orders.findFirst({
    where: eq(orders.id, orderId),
    with: {
      customer: true,
      items: {
        with: { product: true },
        orderBy: (item, { asc }) => [asc(item.id)],
      },
    },
  })
}

/**
 * Inserts an order and its items atomically. Each item's unit price is the
 * product's price at this moment; later price changes do not touch it.
 */
export async function placeOrder(
  db: StorefrontDatabase,
  input: PlaceOrderInput
): Promise<OrderWithItems> {
  if (input.items.length === 0) {
    throw new Error(`Order for customer ${input.customerId} has no items`)
  }
  for (const item of input.items) {
    if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
      throw new Error(`Invalid quantity ${item.quantity} for product ${item.productId}`)
    }
  }

  const orderId = db.transaction((tx) => {
    const [customer] = tx
      .select({ id: customers.id })
      .from(customers)
      .where(eq(customers.id, input.customerId))
      .all()
    if (!customer) {
      throw new Error(`Customer ${input.customerId} does not exist`)
    }

    const productIds = [...new Set(input.items.map((item) => item.productId))]
    const prices = new Map(
      tx
        .select({ id: products.id, price: products.price })
        .from(products)
        .where(inArray(products.id, productIds))
        .all()
        .map((product) => [product.id, product.price])
    )

    const lines = input.items.map((item) => {
      const unitPrice = prices.get(item.productId)
      if (unitPrice === undefined) {
        throw new Error(`Product ${item.productId} does not exist`)
      }
      return { productId: item.productId, quantity: item.quantity, unitPrice }
    })

    const [inserted] = tx
      .insert(orders)
      .values({ customerId: customer.id, status: input.status, orderDate: input.orderDate })
      .returning({ id: orders.id })
      .all()

    tx.insert(orderItems)
      .values(lines.map((line) => ({ ...line, orderId: inserted.id })))
      .run()

    return inserted.id
  })

  const order = await findOrder(db, orderId)
  if (!order) {
    throw new Error(`Order ${orderId} could not be read back after insert`)
  }
  return order
}
