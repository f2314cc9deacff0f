/**
 * Storefront reports. Each function is a read-only query over the seeded
 * schema and returns plain typed rows.
 */

import {
  and,
  asc,
  count,
  countDistinct,
  desc,
  eq,
  gt,
  inArray,
  isNull,
  lte,
  sql,
  type SQL,
  type SQLWrapper,
} from 'drizzle-orm'
import type { StorefrontDatabase } from '../db/client'
import { customers, orderItems, orders, orderSummaries, products } from '../db/schema'

export const DEFAULT_MIN_PRICE = 50
export const DEFAULT_SALES_THRESHOLD = 500
export const DEFAULT_DELIVERED_STATUS = 'Delivered'

// Revenue of one order item
const lineTotal = sql<number>`${orderItems.quantity} * ${orderItems.unitPrice}`

// ── 1. Products by price ────────────────────────────────────────

export interface PriceFilter {
  // Exclusive lower bound
  minPrice?: number
  // Inclusive upper bound
  maxPrice?: number
  direction?: 'asc' | 'desc'
}

export interface ProductRow {
  id: number
  name: string
  category: string
  price: number
}

export async function listProductsByPrice(
  db: StorefrontDatabase,
  filter: PriceFilter = {}
): Promise<ProductRow[]> {
  const { minPrice = DEFAULT_MIN_PRICE, maxPrice, direction = 'desc' } = filter

  const conditions: SQL[] = [gt(products.price, minPrice)]
  if (maxPrice !== undefined) conditions.push(lte(products.price, maxPrice))

  return await db
    .select({
      id: products.id,
      name: products.name,
      category: products.category,
      price: products.price,
    })
    .from(products)
    .where(and(...conditions))
    .orderBy(direction === 'asc' ? asc(products.price) : desc(products.price), asc(products.id))
}

// ── 2. Inventory value per category ─────────────────────────────

export interface CategoryInventoryRow {
  category: string
  productCount: number
  unitsInStock: number
  inventoryValue: number
}

export async function inventoryValueByCategory(
  db: StorefrontDatabase
): Promise<CategoryInventoryRow[]> {
  const inventoryValue = sql<number>`sum(${products.price} * ${products.stockQuantity})`.mapWith(
    Number
  )

  return await db
    .select({
      category: products.category,
      productCount: count(products.id),
      unitsInStock: sql<number>`sum(${products.stockQuantity})`.mapWith(Number),
      inventoryValue,
    })
    .from(products)
    .groupBy(products.category)
    .orderBy(desc(inventoryValue), asc(products.category))
}

// ── 3. Orders and revenue per customer ──────────────────────────

export interface CustomerOrderStatsRow {
  customerId: number
  firstName: string
  lastName: string
  orderCount: number
  totalRevenue: number
  averageItemValue: number
}

export async function customerOrderStats(db: StorefrontDatabase): Promise<CustomerOrderStatsRow[]> {
  const totalRevenue = sql<number>`sum(${lineTotal})`.mapWith(Number)

  return await db
    .select({
      customerId: customers.id,
      firstName: customers.firstName,
      lastName: customers.lastName,
      orderCount: countDistinct(orders.id),
      totalRevenue,
      averageItemValue: sql<number>`avg(${lineTotal})`.mapWith(Number),
    })
    .from(customers)
    .innerJoin(orders, eq(orders.customerId, customers.id))
    .innerJoin(orderItems, eq(orderItems.orderId, orders.id))
    .groupBy(customers.id, customers.firstName, customers.lastName)
    .orderBy(desc(totalRevenue), asc(customers.id))
}

// ── 4. Products in orders with a given status ───────────────────

export interface StatusFilter {
  status?: string
}

export async function productsInDeliveredOrders(
  db: StorefrontDatabase,
  filter: StatusFilter = {}
): Promise<ProductRow[]> {
  const { status = DEFAULT_DELIVERED_STATUS } = filter

  const matchingOrders = db.select({ id: orders.id }).from(orders).where(eq(orders.status, status))
  const orderedProducts = db
    .select({ productId: orderItems.productId })
    .from(orderItems)
    .where(inArray(orderItems.orderId, matchingOrders))

  return await db
    .select({
      id: products.id,
      name: products.name,
      category: products.category,
      price: products.price,
    })
    .from(products)
    .where(inArray(products.id, orderedProducts))
    .orderBy(asc(products.id))
}

// ── 5. Customers without orders ─────────────────────────────────

export interface CustomerRow {
  id: number
  firstName: string
  lastName: string
  email: string
}

export async function customersWithoutOrders(db: StorefrontDatabase): Promise<CustomerRow[]> {
  return await db
    .select({
      id: customers.id,
      firstName: customers.firstName,
      lastName: customers.lastName,
      email: customers.email,
    })
    .from(customers)
    .leftJoin(orders, eq(orders.customerId, customers.id))
    .where(isNull(orders.id))
    .orderBy(asc(customers.id))
}

// ── 6. Categories above a sales threshold ───────────────────────

export interface ThresholdFilter {
  // Exclusive
  threshold?: number
}

export interface CategorySalesRow {
  category: string
  totalSales: number
}

export async function categoriesAboveSalesThreshold(
  db: StorefrontDatabase,
  filter: ThresholdFilter = {}
): Promise<CategorySalesRow[]> {
  const { threshold = DEFAULT_SALES_THRESHOLD } = filter
  const totalSales = sql<number>`sum(${lineTotal})`.mapWith(Number)

  return await db
    .select({ category: products.category, totalSales })
    .from(orderItems)
    .innerJoin(products, eq(products.id, orderItems.productId))
    .groupBy(products.category)
    .having(sql`${totalSales} > ${threshold}`)
    .orderBy(desc(totalSales), asc(products.category))
}

// ── 7. Average revenue per customer ─────────────────────────────

export interface RevenuePerCustomer {
  purchasingCustomers: number
  totalRevenue: number
  averageRevenuePerCustomer: number
}

export async function averageRevenuePerCustomer(db: StorefrontDatabase): Promise<RevenuePerCustomer> {
  const customerRevenue = db
    .select({
      customerId: orders.customerId,
      revenue: sql<number>`sum(${lineTotal})`.as('revenue'),
    })
    .from(orders)
    .innerJoin(orderItems, eq(orderItems.orderId, orders.id))
    .groupBy(orders.customerId)
    .as('customer_revenue')

  const [row] = await db
    .select({
      purchasingCustomers: count(),
      totalRevenue: sql<number>`coalesce(sum(${customerRevenue.revenue}), 0)`.mapWith(Number),
      averageRevenuePerCustomer: sql<number>`coalesce(avg(${customerRevenue.revenue}), 0)`.mapWith(
        Number
      ),
    })
    .from(customerRevenue)

  return row
}

// ── 8. Order summaries view ─────────────────────────────────────

export interface OrderSummaryRow {
  orderId: number
  customerId: number
  orderDate: Date
  status: string
  firstName: string
  lastName: string
  email: string
  lineCount: number
  totalQuantity: number
  orderTotal: number
}

export async function listOrderSummaries(db: StorefrontDatabase): Promise<OrderSummaryRow[]> {
  return await db.select().from(orderSummaries).orderBy(asc(orderSummaries.orderId))
}

// ── 9. Indexes ──────────────────────────────────────────────────

export interface IndexRow {
  name: string
  table: string
}

export async function listIndexes(db: StorefrontDatabase): Promise<IndexRow[]> {
  const rows = db.all<{ name: string; tbl_name: string }>(
    sql`select name, tbl_name from sqlite_master where type = 'index' and name not like 'sqlite_%' order by name`
  )
  return rows.map((row) => ({ name: row.name, table: row.tbl_name }))
}

/**
 * `detail` column of EXPLAIN QUERY PLAN for a query, one entry per plan step.
 */
export async function explainQueryPlan(db: StorefrontDatabase, query: SQLWrapper): Promise<string[]> {
  const rows = db.all<{ detail: string }>(sql`explain query plan ${query.getSQL()}`)
  return rows.map((row) => row.detail)
}
