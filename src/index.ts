export * from './db/schema'
export { openDatabase, storefrontSchema } from './db/client'
export type { OpenDatabaseOptions, StorefrontConnection, StorefrontDatabase } from './db/client'
export { seedDatabase } from './db/seed'
export type { SeedResult } from './db/seed'
export * from './migrations/ddl'
export * from './migrations/changelog'
export * from './reports/queries'
export { reports, runReports, selectReports } from './reports/runner'
export type { ReportDefinition, ReportOptions, ReportTable, RunReportsOptions } from './reports/runner'
export { findOrder, placeOrder } from './services/orders'
export type { OrderWithItems, PlaceOrderInput, PlaceOrderItem } from './services/orders'
export { loadConfig } from './config'
export type { StorefrontConfig } from './config'
export { runCli } from './cli/main'
