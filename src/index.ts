/**
 * Lootcase - Loot Economy Server
 *
 * Entry point for the API server and background giveaway scheduler
 */

import { loadConfig } from './config.js'
import { initDatabase, closeDatabase } from './db/connection.js'
import { ApiServer } from './api/server.js'
import { loadCatalog } from './services/catalog.js'
import { getEconomyConfig } from './services/config.js'
import { LiveFeed, startFeedSimulator, type FeedSimulator } from './services/feed.js'
import { startGiveawayScheduler } from './services/scheduler.js'
import { logger } from './utils/logger.js'

async function main(): Promise<void> {
  logger.info('Starting Lootcase...')

  const config = loadConfig()
  const economy = getEconomyConfig()
  logger.info({
    port: config.port,
    databasePath: config.databasePath,
    catalogPath: config.catalogPath,
    feedSimulator: config.feedSimulator,
    economy,
  }, 'Configuration loaded')

  const catalog = loadCatalog(config.catalogPath)
  const db = initDatabase(config.databasePath)
  const feed = new LiveFeed(economy.feedLimit)

  const server = new ApiServer(config, db, catalog, feed)
  const scheduler = startGiveawayScheduler(db, catalog, feed, config.giveawayTickSeconds)

  let simulator: FeedSimulator | null = null
  if (config.feedSimulator) {
    simulator = startFeedSimulator(feed, catalog)
  }

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down...')

    simulator?.stop()
    scheduler.stop()
    await server.stop()
    closeDatabase(db)

    process.exit(0)
  }

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error) => {
      logger.fatal({ error }, 'Shutdown failed')
      process.exit(1)
    })
  }

  process.on('SIGINT', () => onSignal('SIGINT'))
  process.on('SIGTERM', () => onSignal('SIGTERM'))

  await server.start()
  logger.info(`Lootcase API ready at http://localhost:${config.port}`)
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start Lootcase')
  process.exit(1)
})
