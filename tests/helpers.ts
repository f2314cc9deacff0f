import { openDatabase, type StorefrontConnection } from '../src/db/client'
import { seedDatabase } from '../src/db/seed'

export function openSeededDatabase(): StorefrontConnection {
  const connection = openDatabase()
  seedDatabase(connection.db)
  return connection
}
