import { loadConfig, type StorefrontConfig } from '../config'
import { openDatabase, storefrontSchema } from '../db/client'
import { seedDatabase } from '../db/seed'
import { renderChangelog } from '../migrations/changelog'
import { buildSchemaStatements } from '../migrations/ddl'
import { reports, runReports, selectReports } from '../reports/runner'
import { parseArgs, type CliArgs } from './args'

export const USAGE = `Usage: storefront-analytics [options]

Creates the storefront schema, seeds it and prints every report.

Options:
  --db=<path>            SQLite file (default: STOREFRONT_DB_PATH or :memory:)
  --report=<key>[,<key>] Only run these reports: ${reports.map((r) => r.key).join(', ')}
  --threshold=<n>        Sales threshold for top-categories
  --min-price=<n>        Lower price bound for products-by-price
  --changelog            Print the schema as a Liquibase formatted SQL changelog
  -h, --help             Show this help`

export interface CliContext {
  env?: Record<string, string | undefined>
  log?: (line: string) => void
  error?: (line: string) => void
}

function applyOverrides(config: StorefrontConfig, args: CliArgs): StorefrontConfig {
  return {
    ...config,
    databasePath: args.db ?? config.databasePath,
    salesThreshold: args.threshold ?? config.salesThreshold,
    minPrice: args.minPrice ?? config.minPrice,
  }
}

/**
 * Runs the CLI and resolves with the process exit code.
 */
export async function runCli(argv: string[], context: CliContext = {}): Promise<number> {
  const log = context.log ?? console.log
  const error = context.error ?? console.error

  try {
    const args = parseArgs(argv)
    if (args.help) {
      log(USAGE)
      return 0
    }

    const config = applyOverrides(loadConfig(context.env ?? process.env), args)

    if (args.changelog) {
      const statements = buildSchemaStatements(storefrontSchema)
      log(renderChangelog(statements, { author: config.changelogAuthor }).trimEnd())
      return 0
    }

    // Unknown keys fail before the database file is created
    const selection = selectReports(args.reports)

    const connection = openDatabase({ path: config.databasePath })
    try {
      log(`Schema ready (${config.databasePath})`)

      const seeded = seedDatabase(connection.db)
      log(
        seeded.skipped
          ? 'Seed skipped: customers already present'
          : `Seeded ${seeded.customers} customers, ${seeded.products} products, ` +
              `${seeded.orders} orders, ${seeded.orderItems} order items`
      )
      log('')

      await runReports(connection.db, config, { selection, log })
    } finally {
      connection.close()
    }

    return 0
  } catch (err) {
    error(`Error: ${err instanceof Error ? err.message : String(err)}`)
    return 1
  }
}
