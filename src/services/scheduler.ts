/**
 * Giveaway Scheduler
 * Keeps upcoming slots filled and pays out giveaways as their deadlines pass
 */

import type { Database } from 'better-sqlite3'
import type { Catalog } from '../types/index.js'
import type { LiveFeed } from './feed.js'
import { ensureUpcomingGiveaways, resolveDueGiveaways, type GiveawayResolution } from './giveaways.js'
import { getUserById } from './user.js'
import { secureRandom, type RandomSource } from './random.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger({ module: 'scheduler' })

/**
 * One scheduler pass: resolve what is due, publish winners, top up the slots
 */
export function runGiveawayTick(
  db: Database,
  catalog: Catalog,
  feed: LiveFeed,
  now: Date = new Date(),
  source: RandomSource = secureRandom
): GiveawayResolution[] {
  const resolved = resolveDueGiveaways(db, catalog, now, source)

  for (const result of resolved) {
    if (!result.winnerId || !result.reward) continue
    const winner = getUserById(db, result.winnerId)
    if (winner) {
      feed.recordDrop(winner.nickname, result.reward)
    }
  }

  ensureUpcomingGiveaways(db, catalog, now, source)
  return resolved
}

export interface GiveawayScheduler {
  stop(): void
}

export function startGiveawayScheduler(
  db: Database,
  catalog: Catalog,
  feed: LiveFeed,
  tickSeconds: number
): GiveawayScheduler {
  const tick = (): void => {
    try {
      runGiveawayTick(db, catalog, feed)
    } catch (error) {
      log.error({ error }, 'Giveaway tick failed')
    }
  }

  tick()
  const timer = setInterval(tick, tickSeconds * 1000)
  log.info({ tickSeconds }, 'Giveaway scheduler started')

  return {
    stop() {
      clearInterval(timer)
      log.info('Giveaway scheduler stopped')
    },
  }
}
