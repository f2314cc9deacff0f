/**
 * SQLite DDL rendering for drizzle `sqlite-core` schemas.
 *
 * Every CREATE statement is paired with the DROP that undoes it, so the same
 * list can be applied to a connection or exported as changesets.
 */

import { getTableName, is, SQL } from 'drizzle-orm'
import {
  getTableConfig,
  getViewConfig,
  SQLiteColumn,
  SQLiteSyncDialect,
  type AnySQLiteTable,
  type Index,
  type SQLiteView,
} from 'drizzle-orm/sqlite-core'
import type Database from 'better-sqlite3'

export type SchemaStatementKind = 'table' | 'index' | 'view'

export interface SchemaStatement {
  kind: SchemaStatementKind
  name: string
  sql: string
  rollback: string
}

export interface SchemaDefinition {
  tables: AnySQLiteTable[]
  views?: SQLiteView[]
}

const dialect = new SQLiteSyncDialect()

export function escapeName(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

function escapeString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}

// ── Columns ─────────────────────────────────────────────────────

function renderDefault(tableName: string, column: SQLiteColumn): string {
  const value: unknown = column.default
  if (is(value, SQL)) {
    return dialect.sqlToQuery(value).sql
  }
  switch (typeof value) {
    case 'string':
      return escapeString(value)
    case 'number':
    case 'bigint':
      return String(value)
    case 'boolean':
      return value ? '1' : '0'
    default:
      throw new Error(
        `Unsupported default for column "${tableName}"."${column.name}": ${typeof value}`
      )
  }
}

function isAutoIncrement(column: SQLiteColumn): boolean {
  return 'autoIncrement' in column && column.autoIncrement === true
}

function renderColumn(tableName: string, column: SQLiteColumn): string {
  const parts = [escapeName(column.name), column.getSQLType()]

  if (column.primary) {
    parts.push('PRIMARY KEY')
    if (isAutoIncrement(column)) parts.push('AUTOINCREMENT')
  }
  // $defaultFn() marks a column as defaulted without a database-side value
  if (column.hasDefault && column.default !== undefined) {
    parts.push(`DEFAULT ${renderDefault(tableName, column)}`)
  }
  if (column.notNull && !column.primary) parts.push('NOT NULL')
  if (column.isUnique) parts.push('UNIQUE')

  return parts.join(' ')
}

// ── Tables ──────────────────────────────────────────────────────

export function renderCreateTable(table: AnySQLiteTable): string {
  const config = getTableConfig(table)

  if (config.primaryKeys.length > 0) {
    throw new Error(`Composite primary keys are not supported (table "${config.name}")`)
  }
  const lines = config.columns.map((column) => renderColumn(config.name, column))

  for (const fk of config.foreignKeys) {
    const reference = fk.reference()
    const columns = reference.columns.map((c) => escapeName(c.name)).join(', ')
    const foreignColumns = reference.foreignColumns.map((c) => escapeName(c.name)).join(', ')
    let line =
      `CONSTRAINT ${escapeName(fk.getName())} FOREIGN KEY (${columns}) ` +
      `REFERENCES ${escapeName(getTableName(reference.foreignTable))}(${foreignColumns})`
    if (fk.onDelete && fk.onDelete !== 'no action') line += ` ON DELETE ${fk.onDelete.toUpperCase()}`
    if (fk.onUpdate && fk.onUpdate !== 'no action') line += ` ON UPDATE ${fk.onUpdate.toUpperCase()}`
    lines.push(line)
  }

  for (const constraint of config.uniqueConstraints) {
    const names = constraint.columns.map((c) => c.name)
    const name = constraint.name ?? `${config.name}_${names.join('_')}_unique`
    lines.push(`CONSTRAINT ${escapeName(name)} UNIQUE (${names.map(escapeName).join(', ')})`)
  }

  for (const check of config.checks) {
    lines.push(
      `CONSTRAINT ${escapeName(check.name)} CHECK (${dialect.sqlToQuery(check.value, 'indexes').sql})`
    )
  }

  return `CREATE TABLE IF NOT EXISTS ${escapeName(config.name)} (\n  ${lines.join(',\n  ')}\n)`
}

// ── Indexes ─────────────────────────────────────────────────────

function renderCreateIndex(tableName: string, index: Index): string {
  const { name, columns, unique, where } = index.config
  const rendered = columns
    .map((column) =>
      is(column, SQLiteColumn) ? escapeName(column.name) : dialect.sqlToQuery(column, 'indexes').sql
    )
    .join(', ')

  let statement =
    `CREATE ${unique ? 'UNIQUE ' : ''}INDEX IF NOT EXISTS ${escapeName(name)} ` +
    `ON ${escapeName(tableName)} (${rendered})`
  if (where) statement += ` WHERE ${dialect.sqlToQuery(where, 'indexes').sql}`
  return statement
}

export function renderCreateIndexes(table: AnySQLiteTable): string[] {
  const config = getTableConfig(table)
  return config.indexes.map((index) => renderCreateIndex(config.name, index))
}

// ── Views ───────────────────────────────────────────────────────

export function renderCreateView(view: SQLiteView): string {
  const config = getViewConfig(view)
  if (config.isExisting || !config.query) {
    throw new Error(`View "${config.name}" is declared as existing and has no query to render`)
  }
  return `CREATE VIEW IF NOT EXISTS ${escapeName(config.name)} AS ${dialect.sqlToQuery(config.query).sql}`
}

// ── Ordering ────────────────────────────────────────────────────

/**
 * Orders tables so that every table comes after the tables it references.
 * Tables without dependencies keep their input order; self references are ignored.
 */
export function sortTablesByDependencies<T extends AnySQLiteTable>(tables: T[]): T[] {
  const byName = new Map(tables.map((table) => [getTableName(table), table]))
  const state = new Map<string, 'visiting' | 'done'>()
  const sorted: T[] = []

  const visit = (table: T, path: string[]): void => {
    const name = getTableName(table)
    const current = state.get(name)
    if (current === 'done') return
    if (current === 'visiting') {
      throw new Error(`Foreign key cycle between tables: ${[...path, name].join(' -> ')}`)
    }

    state.set(name, 'visiting')
    for (const fk of getTableConfig(table).foreignKeys) {
      const target = getTableName(fk.reference().foreignTable)
      const dependency = byName.get(target)
      if (target !== name && dependency) visit(dependency, [...path, name])
    }
    state.set(name, 'done')
    sorted.push(table)
  }

  for (const table of tables) visit(table, [])
  return sorted
}

// ── Statements ──────────────────────────────────────────────────

export function buildSchemaStatements(schema: SchemaDefinition): SchemaStatement[] {
  const tables = sortTablesByDependencies(schema.tables)
  const statements: SchemaStatement[] = []

  for (const table of tables) {
    const name = getTableName(table)
    statements.push({
      kind: 'table',
      name,
      sql: renderCreateTable(table),
      rollback: `DROP TABLE IF EXISTS ${escapeName(name)}`,
    })
  }

  for (const table of tables) {
    const tableName = getTableName(table)
    for (const index of getTableConfig(table).indexes) {
      statements.push({
        kind: 'index',
        name: index.config.name,
        sql: renderCreateIndex(tableName, index),
        rollback: `DROP INDEX IF EXISTS ${escapeName(index.config.name)}`,
      })
    }
  }

  for (const view of schema.views ?? []) {
    const { name } = getViewConfig(view)
    statements.push({
      kind: 'view',
      name,
      sql: renderCreateView(view),
      rollback: `DROP VIEW IF EXISTS ${escapeName(name)}`,
    })
  }

  return statements
}

/**
 * Runs the statements in a single transaction. Statements use IF NOT EXISTS,
 * so applying the same list twice leaves the database unchanged.
 */
export function applySchema(sqlite: Database.Database, statements: SchemaStatement[]): void {
  const apply = sqlite.transaction((pending: SchemaStatement[]) => {
    for (const statement of pending) sqlite.exec(statement.sql)
  })

  try {
    apply(statements)
  } catch (error) {
    throw new Error(`Failed to apply schema: ${error}`, { cause: error })
  }
}
