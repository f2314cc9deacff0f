import {
  DEFAULT_DELIVERED_STATUS,
  DEFAULT_MIN_PRICE,
  DEFAULT_SALES_THRESHOLD,
} from './reports/queries'

export interface StorefrontConfig {
  databasePath: string
  salesThreshold: number
  minPrice: number
  deliveredStatus: string
  changelogAuthor: string
}

type Env = Record<string, string | undefined>

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return fallback

  const value = Number(raw)
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`)
  }
  return value
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim()
  return raw ? raw : fallback
}

/**
 * Reads STOREFRONT_* variables. The CLI loads `.env` into process.env first.
 */
export function loadConfig(env: Env = process.env): StorefrontConfig {
  return {
    databasePath: readString(env, 'STOREFRONT_DB_PATH', ':memory:'),
    salesThreshold: readNumber(env, 'STOREFRONT_SALES_THRESHOLD', DEFAULT_SALES_THRESHOLD),
    minPrice: readNumber(env, 'STOREFRONT_MIN_PRICE', DEFAULT_MIN_PRICE),
    deliveredStatus: readString(env, 'STOREFRONT_DELIVERED_STATUS', DEFAULT_DELIVERED_STATUS),
    changelogAuthor: readString(env, 'STOREFRONT_CHANGELOG_AUTHOR', 'storefront'),
  }
}
