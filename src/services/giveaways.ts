/**
 * Giveaway Service
 *
 * Slots start every giveawayIntervalHours (aligned to the epoch). A giveaway
 * is open while now < startAt, closed once the deadline passes, and resolved
 * after the winner has been drawn and paid. One that cannot be drawn is
 * cancelled instead: resolved without a winner, every entry refunded.
 */

import type { Database } from 'better-sqlite3'
import type {
  Catalog,
  CatalogItem,
  Giveaway,
  GiveawayRow,
  InventoryEntry,
  User,
} from '../types/index.js'
import { generateId, withTransaction } from '../db/connection.js'
import { getEconomyConfig } from './config.js'
import { creditBalance, debitBalance } from './balance.js'
import { grantItem } from './inventory.js'
import { pickOne, secureRandom, type RandomSource } from './random.js'
import { requireUser } from './user.js'
import {
  AlreadyJoinedError,
  GiveawayClosedError,
  GiveawayNotDueError,
  InsufficientFundsError,
  InvariantViolationError,
  UnknownGiveawayError,
} from '../utils/errors.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger({ module: 'giveaways' })

export interface GiveawayListing {
  giveaway: Giveaway
  reward: CatalogItem
  participants: number
}

export interface GiveawayResolution {
  giveaway: Giveaway
  winnerId: string | null
  reward: InventoryEntry | null
  participants: number
  alreadyResolved: boolean
}

function parseGiveawayRow(row: GiveawayRow): Giveaway {
  return {
    id: row.id,
    entryPrice: row.entry_price,
    rewardItemId: row.reward_item_id,
    startAt: new Date(row.start_at),
    resolved: row.resolved === 1,
    winnerId: row.winner_id,
    rewardEntryId: row.reward_entry_id,
    resolvedAt: row.resolved_at !== null ? new Date(row.resolved_at) : null,
    cancelledAt: row.cancelled_at !== null ? new Date(row.cancelled_at) : null,
  }
}

/**
 * Get giveaway by ID (returns null if not found)
 */
export function getGiveaway(db: Database, giveawayId: string): Giveaway | null {
  const row = db.prepare(`
    SELECT * FROM giveaways WHERE id = ?
  `).get(giveawayId) as GiveawayRow | undefined

  return row ? parseGiveawayRow(row) : null
}

function requireGiveaway(db: Database, giveawayId: string): Giveaway {
  const giveaway = getGiveaway(db, giveawayId)
  if (!giveaway) {
    throw new UnknownGiveawayError(giveawayId)
  }
  return giveaway
}

/**
 * Candidate rewards: the configured rarities, or the whole catalog if none match
 */
function rewardPool(catalog: Catalog): CatalogItem[] {
  const rarities = new Set(getEconomyConfig().giveawayRarities)
  const pool = catalog.items.filter(item => rarities.has(item.rarity))
  return pool.length > 0 ? pool : catalog.items
}

/**
 * Insert a giveaway for a specific deadline
 */
function createGiveaway(
  db: Database,
  params: { startAt: Date; entryPrice: number; reward: CatalogItem; now: Date }
): Giveaway {
  const id = generateId()

  db.prepare(`
    INSERT INTO giveaways (id, entry_price, reward_item_id, start_at, created_at)
    VALUES (?, ?, ?, ?, ?)
  `).run(id, params.entryPrice, params.reward.id, params.startAt.getTime(), params.now.getTime())

  log.info({
    giveawayId: id,
    startAt: params.startAt.toISOString(),
    entryPrice: params.entryPrice,
    rewardItemId: params.reward.id,
  }, 'Giveaway scheduled')

  return {
    id,
    entryPrice: params.entryPrice,
    rewardItemId: params.reward.id,
    startAt: params.startAt,
    resolved: false,
    winnerId: null,
    rewardEntryId: null,
    resolvedAt: null,
    cancelledAt: null,
  }
}

/**
 * Make sure the next giveawayCount slots exist. Existing slots are untouched.
 * Entry prices cycle through giveawayEntryPrices by slot number.
 */
export function ensureUpcomingGiveaways(
  db: Database,
  catalog: Catalog,
  now: Date = new Date(),
  source: RandomSource = secureRandom
): Giveaway[] {
  const config = getEconomyConfig()
  const intervalMs = config.giveawayIntervalHours * 60 * 60 * 1000
  const pool = rewardPool(catalog)

  if (pool.length === 0) {
    log.warn('Catalog has no items; no giveaways scheduled')
    return []
  }

  const firstSlot = Math.floor(now.getTime() / intervalMs) + 1

  return withTransaction(db, () => {
    const created: Giveaway[] = []
    const exists = db.prepare(`SELECT 1 FROM giveaways WHERE start_at = ?`)

    for (let i = 0; i < config.giveawayCount; i++) {
      const slot = firstSlot + i
      const startAt = slot * intervalMs
      if (exists.get(startAt)) {
        continue
      }

      const prices = config.giveawayEntryPrices
      created.push(createGiveaway(db, {
        startAt: new Date(startAt),
        entryPrice: prices[slot % prices.length],
        reward: pickOne(pool, source),
        now,
      }))
    }

    return created
  })
}

/**
 * Open giveaways, soonest first, with participant counts
 */
export function listGiveaways(
  db: Database,
  catalog: Catalog,
  now: Date = new Date()
): GiveawayListing[] {
  const rows = db.prepare(`
    SELECT g.*, COUNT(e.user_id) AS participants
    FROM giveaways g
    LEFT JOIN giveaway_entries e ON e.giveaway_id = g.id
    WHERE g.resolved = 0 AND g.start_at > ?
    GROUP BY g.id
    ORDER BY g.start_at ASC
  `).all(now.getTime()) as Array<GiveawayRow & { participants: number }>

  const listings: GiveawayListing[] = []
  for (const row of rows) {
    const reward = catalog.itemsById.get(row.reward_item_id)
    if (!reward) {
      log.warn({ giveawayId: row.id, rewardItemId: row.reward_item_id }, 'Giveaway reward missing from catalog')
      continue
    }
    listings.push({ giveaway: parseGiveawayRow(row), reward, participants: row.participants })
  }
  return listings
}

/**
 * Buy a ticket for a giveaway
 */
export function joinGiveaway(
  db: Database,
  userId: string,
  giveawayId: string,
  now: Date = new Date()
): { giveaway: Giveaway; user: User; transactionId: string } {
  return withTransaction(db, () => {
    const giveaway = requireGiveaway(db, giveawayId)

    // A join exactly at the deadline is rejected
    if (giveaway.resolved || now.getTime() >= giveaway.startAt.getTime()) {
      throw new GiveawayClosedError(giveawayId)
    }

    const existing = db.prepare(`
      SELECT 1 FROM giveaway_entries WHERE giveaway_id = ? AND user_id = ?
    `).get(giveawayId, userId)
    if (existing) {
      throw new AlreadyJoinedError(giveawayId)
    }

    const user = requireUser(db, userId)
    if (user.balance < giveaway.entryPrice) {
      throw new InsufficientFundsError(giveaway.entryPrice, user.balance)
    }

    const debit = debitBalance(db, userId, giveaway.entryPrice, 'giveaway_entry', now, { giveawayId })

    db.prepare(`
      INSERT INTO giveaway_entries (giveaway_id, user_id, entry_price, joined_at)
      VALUES (?, ?, ?, ?)
    `).run(giveawayId, userId, giveaway.entryPrice, now.getTime())

    log.info({
      userId,
      giveawayId,
      entryPrice: giveaway.entryPrice,
      balanceAfter: debit.balanceAfter,
    }, 'Joined giveaway')

    return {
      giveaway,
      user: requireUser(db, userId),
      transactionId: debit.transactionId,
    }
  })
}

/**
 * Draw one winner, one ticket per participant. Null when nobody entered.
 */
export function pickGiveawayWinner(
  participantIds: readonly string[],
  source: RandomSource = secureRandom
): string | null {
  if (participantIds.length === 0) {
    return null
  }
  return pickOne(participantIds, source)
}

/**
 * Participants in join order
 */
export function getParticipantIds(db: Database, giveawayId: string): string[] {
  const rows = db.prepare(`
    SELECT user_id FROM giveaway_entries
    WHERE giveaway_id = ?
    ORDER BY joined_at ASC, user_id ASC
  `).all(giveawayId) as Array<{ user_id: string }>

  return rows.map(r => r.user_id)
}

/**
 * Draw and pay out a giveaway whose deadline has passed.
 * Resolving twice returns the stored outcome.
 */
export function resolveGiveaway(
  db: Database,
  catalog: Catalog,
  giveawayId: string,
  now: Date = new Date(),
  source: RandomSource = secureRandom
): GiveawayResolution {
  return withTransaction(db, () => {
    const giveaway = requireGiveaway(db, giveawayId)
    const participantIds = getParticipantIds(db, giveawayId)

    if (giveaway.resolved) {
      return {
        giveaway,
        winnerId: giveaway.winnerId,
        reward: null,
        participants: participantIds.length,
        alreadyResolved: true,
      }
    }

    if (now.getTime() < giveaway.startAt.getTime()) {
      throw new GiveawayNotDueError(giveawayId, giveaway.startAt)
    }

    const rewardItem = catalog.itemsById.get(giveaway.rewardItemId)
    if (!rewardItem) {
      throw new InvariantViolationError('Giveaway reward missing from catalog', {
        giveawayId,
        rewardItemId: giveaway.rewardItemId,
      })
    }

    const winnerId = pickGiveawayWinner(participantIds, source)
    const reward = winnerId ? grantItem(db, winnerId, rewardItem, 'giveaway', now) : null

    db.prepare(`
      UPDATE giveaways
      SET resolved = 1, winner_id = ?, reward_entry_id = ?, resolved_at = ?
      WHERE id = ? AND resolved = 0
    `).run(winnerId, reward?.id ?? null, now.getTime(), giveawayId)

    log.info({
      giveawayId,
      participants: participantIds.length,
      winnerId,
      rewardItemId: rewardItem.id,
    }, winnerId ? 'Giveaway resolved' : 'Giveaway resolved without participants')

    return {
      giveaway: {
        ...giveaway,
        resolved: true,
        winnerId,
        rewardEntryId: reward?.id ?? null,
        resolvedAt: now,
      },
      winnerId,
      reward,
      participants: participantIds.length,
      alreadyResolved: false,
    }
  })
}

/**
 * Close a giveaway without a draw and refund every entry.
 * Already resolved giveaways are left as they are.
 */
export function cancelGiveaway(
  db: Database,
  giveawayId: string,
  now: Date = new Date()
): { giveaway: Giveaway; refunded: number } {
  return withTransaction(db, () => {
    const giveaway = requireGiveaway(db, giveawayId)
    if (giveaway.resolved) {
      return { giveaway, refunded: 0 }
    }

    const entries = db.prepare(`
      SELECT user_id, entry_price FROM giveaway_entries
      WHERE giveaway_id = ?
      ORDER BY joined_at ASC, user_id ASC
    `).all(giveawayId) as Array<{ user_id: string; entry_price: number }>

    for (const entry of entries) {
      creditBalance(db, entry.user_id, entry.entry_price, 'giveaway_refund', now, { giveawayId })
    }

    db.prepare(`
      UPDATE giveaways
      SET resolved = 1, resolved_at = ?, cancelled_at = ?
      WHERE id = ? AND resolved = 0
    `).run(now.getTime(), now.getTime(), giveawayId)

    log.warn({ giveawayId, refunded: entries.length }, 'Giveaway cancelled')

    return {
      giveaway: { ...giveaway, resolved: true, resolvedAt: now, cancelledAt: now },
      refunded: entries.length,
    }
  })
}

/**
 * Resolve every giveaway whose deadline has passed. Giveaways whose reward
 * left the catalog are cancelled; other failures are retried next tick.
 */
export function resolveDueGiveaways(
  db: Database,
  catalog: Catalog,
  now: Date = new Date(),
  source: RandomSource = secureRandom
): GiveawayResolution[] {
  const due = db.prepare(`
    SELECT id, reward_item_id FROM giveaways
    WHERE resolved = 0 AND start_at <= ?
    ORDER BY start_at ASC
  `).all(now.getTime()) as Array<{ id: string; reward_item_id: string }>

  const results: GiveawayResolution[] = []
  for (const { id, reward_item_id: rewardItemId } of due) {
    try {
      if (!catalog.itemsById.has(rewardItemId)) {
        log.error({ giveawayId: id, rewardItemId }, 'Giveaway reward missing from catalog')
        cancelGiveaway(db, id, now)
        continue
      }
      results.push(resolveGiveaway(db, catalog, id, now, source))
    } catch (error) {
      // One broken giveaway must not hold back the rest
      log.error({ error, giveawayId: id }, 'Failed to resolve giveaway')
    }
  }
  return results
}
