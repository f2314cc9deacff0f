import Database from 'better-sqlite3'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import { applySchema, buildSchemaStatements, type SchemaDefinition } from '../migrations/ddl'
import * as schema from './schema'

export type StorefrontDatabase = BetterSQLite3Database<typeof schema>

export const storefrontSchema: SchemaDefinition = {
  tables: [schema.customers, schema.products, schema.orders, schema.orderItems],
  views: [schema.orderSummaries],
}

export interface StorefrontConnection {
  db: StorefrontDatabase
  sqlite: Database.Database
  close(): void
}

export interface OpenDatabaseOptions {
  // File path, or ':memory:' (default)
  path?: string
  // Create missing tables, indexes and views on open (default: true)
  migrate?: boolean
}

export function openDatabase(options: OpenDatabaseOptions = {}): StorefrontConnection {
  const path = options.path ?? ':memory:'

  let sqlite: Database.Database
  try {
    sqlite = new Database(path)
  } catch (error) {
    throw new Error(`Failed to open database at ${path}: ${error}`, { cause: error })
  }

  sqlite.pragma('foreign_keys = ON')

  if (options.migrate ?? true) {
    try {
      applySchema(sqlite, buildSchemaStatements(storefrontSchema))
    } catch (error) {
      sqlite.close()
      throw error
    }
  }

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => sqlite.close(),
  }
}
