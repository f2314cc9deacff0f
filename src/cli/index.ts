#!/usr/bin/env npx tsx
/**
 * Storefront analytics CLI
 *
 * Usage:
 *   npx tsx src/cli/index.ts
 *   npx tsx src/cli/index.ts --db=storefront.db --report=arpu,top-categories
 *   npx tsx src/cli/index.ts --changelog > changelog.sql
 */

import * as dotenv from 'dotenv'
import { runCli } from './main'

dotenv.config()

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error) => {
    console.error(error)
    process.exitCode = 1
  })
