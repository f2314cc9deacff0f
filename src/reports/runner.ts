import { eq } from 'drizzle-orm'
import type { StorefrontConfig } from '../config'
import type { StorefrontDatabase } from '../db/client'
import { orders, products } from '../db/schema'
import { formatDate, formatMoney, generateTable } from './format'
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
} from './queries'

export type ReportOptions = Pick<StorefrontConfig, 'minPrice' | 'salesThreshold' | 'deliveredStatus'>

export interface ReportTable {
  headers: string[]
  rows: string[][]
  // Printed after the table
  notes?: string[]
}

export interface ReportDefinition {
  key: string
  title(options: ReportOptions): string
  run(db: StorefrontDatabase, options: ReportOptions): Promise<ReportTable>
}

export interface RunReportsOptions {
  // Report keys; ignored when `selection` is given
  only?: string[]
  // Reports already picked with selectReports()
  selection?: ReportDefinition[]
  log?: (line: string) => void
}

const fullName = (row: { firstName: string; lastName: string }) => `${row.firstName} ${row.lastName}`

// ============================================================================
// Registry (runs in this order)
// ============================================================================

export const reports: ReportDefinition[] = [
  {
    key: 'products-by-price',
    title: (options) => `Products priced above ${formatMoney(options.minPrice)}, most expensive first`,
    run: async (db, options) => {
      const rows = await listProductsByPrice(db, { minPrice: options.minPrice })
      return {
        headers: ['ID', 'Product', 'Category', 'Price'],
        rows: rows.map((p) => [String(p.id), p.name, p.category, formatMoney(p.price)]),
      }
    },
  },
  {
    key: 'inventory-by-category',
    title: () => 'Inventory value per category',
    run: async (db) => {
      const rows = await inventoryValueByCategory(db)
      return {
        headers: ['Category', 'Products', 'Units in stock', 'Inventory value'],
        rows: rows.map((c) => [
          c.category,
          String(c.productCount),
          String(c.unitsInStock),
          formatMoney(c.inventoryValue),
        ]),
      }
    },
  },
  {
    key: 'customer-orders',
    title: () => 'Orders and revenue per customer',
    run: async (db) => {
      const rows = await customerOrderStats(db)
      return {
        headers: ['Customer', 'Orders', 'Total revenue', 'Average item value'],
        rows: rows.map((c) => [
          fullName(c),
          String(c.orderCount),
          formatMoney(c.totalRevenue),
          formatMoney(c.averageItemValue),
        ]),
      }
    },
  },
  {
    key: 'delivered-products',
    title: (options) => `Products in ${options.deliveredStatus} orders`,
    run: async (db, options) => {
      const rows = await productsInDeliveredOrders(db, { status: options.deliveredStatus })
      return {
        headers: ['ID', 'Product', 'Category', 'Price'],
        rows: rows.map((p) => [String(p.id), p.name, p.category, formatMoney(p.price)]),
      }
    },
  },
  {
    key: 'customers-without-orders',
    title: () => 'Customers without orders',
    run: async (db) => {
      const rows = await customersWithoutOrders(db)
      return {
        headers: ['ID', 'Customer', 'Email'],
        rows: rows.map((c) => [String(c.id), fullName(c), c.email]),
      }
    },
  },
  {
    key: 'top-categories',
    title: (options) => `Categories with sales above ${formatMoney(options.salesThreshold)}`,
    run: async (db, options) => {
      const rows = await categoriesAboveSalesThreshold(db, { threshold: options.salesThreshold })
      return {
        headers: ['Category', 'Total sales'],
        rows: rows.map((c) => [c.category, formatMoney(c.totalSales)]),
      }
    },
  },
  {
    key: 'arpu',
    title: () => 'Average revenue per customer (ARPU)',
    run: async (db) => {
      const result = await averageRevenuePerCustomer(db)
      return {
        headers: ['Purchasing customers', 'Total revenue', 'ARPU'],
        rows: [
          [
            String(result.purchasingCustomers),
            formatMoney(result.totalRevenue),
            formatMoney(result.averageRevenuePerCustomer),
          ],
        ],
      }
    },
  },
  {
    key: 'order-summaries',
    title: () => 'Order summaries (view order_summaries)',
    run: async (db) => {
      const rows = await listOrderSummaries(db)
      return {
        headers: ['Order', 'Date', 'Status', 'Customer', 'Lines', 'Quantity', 'Total'],
        rows: rows.map((o) => [
          String(o.orderId),
          formatDate(o.orderDate),
          o.status,
          fullName(o),
          String(o.lineCount),
          String(o.totalQuantity),
          formatMoney(o.orderTotal),
        ]),
      }
    },
  },
  {
    key: 'indexes',
    title: () => 'Secondary indexes',
    run: async (db) => {
      const rows = await listIndexes(db)
      const customerLookup = await explainQueryPlan(
        db,
        db.select().from(orders).where(eq(orders.customerId, 1))
      )
      const nameLookup = await explainQueryPlan(
        db,
        db.select().from(products).where(eq(products.name, 'Standing Desk'))
      )
      return {
        headers: ['Index', 'Table'],
        rows: rows.map((index) => [index.name, index.table]),
        notes: [
          `Orders by customer_id: ${customerLookup.join('; ')}`,
          `Products by name: ${nameLookup.join('; ')}`,
        ],
      }
    },
  },
]

export function selectReports(only?: string[]): ReportDefinition[] {
  if (!only || only.length === 0) return reports

  const known = new Set(reports.map((report) => report.key))
  const unknown = only.filter((key) => !known.has(key))
  if (unknown.length > 0) {
    throw new Error(
      `Unknown report "${unknown.join('", "')}". Available: ${reports.map((r) => r.key).join(', ')}`
    )
  }
  return reports.filter((report) => only.includes(report.key))
}

/**
 * Runs the reports in registry order, logging a status line before each
 * block and the result as a markdown table after it.
 */
export async function runReports(
  db: StorefrontDatabase,
  options: ReportOptions,
  { only, selection, log = console.log }: RunReportsOptions = {}
): Promise<void> {
  for (const report of selection ?? selectReports(only)) {
    log(`-- ${reports.indexOf(report) + 1}. ${report.title(options)}`)

    const table = await report.run(db, options)
    log(table.rows.length > 0 ? generateTable(table.headers, table.rows) : '(no rows)')
    for (const note of table.notes ?? []) log(note)
    log('')
  }
}
