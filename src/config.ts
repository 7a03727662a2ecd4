/**
 * Configuration loading from environment variables
 */

import type { ApiConfig } from './types/index.js'

/**
 * Full process config: API settings plus background jobs
 */
export interface LootcaseConfig extends ApiConfig {
  catalogPath: string
  feedSimulator: boolean
  giveawayTickSeconds: number
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): LootcaseConfig {
  const port = parseInt(process.env.LOOTCASE_PORT || '3100', 10)
  const databasePath = process.env.LOOTCASE_DATABASE_PATH || './data/lootcase.db'
  const catalogPath = process.env.LOOTCASE_CATALOG_PATH || './data/catalog.json'

  if (isNaN(port) || port < 0 || port > 65535) {
    throw new Error(
      `LOOTCASE_PORT must be a valid port number, got "${process.env.LOOTCASE_PORT}"`
    )
  }

  const tickSeconds = parseInt(process.env.LOOTCASE_GIVEAWAY_TICK_SECONDS || '30', 10)

  return {
    port,
    databasePath,
    catalogPath,
    feedSimulator: process.env.LOOTCASE_FEED_SIMULATOR === 'true',
    giveawayTickSeconds: !isNaN(tickSeconds) && tickSeconds > 0 ? tickSeconds : 30,
  }
}

/**
 * Check if running in development mode
 */
export function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production'
}

/**
 * Get log level from environment
 */
export function getLogLevel(): string {
  return process.env.LOG_LEVEL || (isDevelopment() ? 'debug' : 'info')
}
