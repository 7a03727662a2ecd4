/**
 * Inventory Service
 * Grants, lookups and state transitions of owned item instances
 */

import type { Database } from 'better-sqlite3'
import type {
  CatalogItem,
  InventoryEntry,
  InventoryItemPayload,
  InventoryRow,
  InventorySource,
  InventoryStatus,
  User,
} from '../types/index.js'
import { generateId, withTransaction } from '../db/connection.js'
import { creditBalance } from './balance.js'
import { requireUser } from './user.js'
import { InvalidSelectionError, InvariantViolationError, NotOwnedError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

const INVENTORY_STATUSES: readonly InventoryStatus[] = ['owned', 'sold', 'upgraded', 'failed']
const INVENTORY_SOURCES: readonly InventorySource[] = ['case', 'upgrade', 'giveaway']

function parseInventoryRow(row: InventoryRow): InventoryEntry {
  const status = INVENTORY_STATUSES.find(s => s === row.status)
  const source = INVENTORY_SOURCES.find(s => s === row.source)
  if (!status || !source) {
    throw new InvariantViolationError('Corrupted inventory row', {
      entryId: row.id,
      status: row.status,
      source: row.source,
    })
  }

  return {
    id: row.id,
    userId: row.user_id,
    itemId: row.item_id,
    name: row.name,
    rarity: row.rarity,
    price: row.price,
    stattrak: row.stattrak === 1,
    status,
    source,
    caseId: row.case_id,
    acquiredAt: new Date(row.acquired_at),
  }
}

/**
 * API shape of an inventory entry
 */
export function toInventoryPayload(entry: InventoryEntry): InventoryItemPayload {
  return {
    id: entry.id,
    itemId: entry.itemId,
    name: entry.name,
    rarity: entry.rarity,
    price: entry.price,
    stattrak: entry.stattrak,
    status: entry.status,
    source: entry.source,
    caseId: entry.caseId,
    acquiredAt: entry.acquiredAt.toISOString(),
  }
}

/**
 * Create a new owned entry for a catalog item
 */
export function grantItem(
  db: Database,
  userId: string,
  item: CatalogItem,
  source: InventorySource,
  now: Date,
  caseId: string | null = null
): InventoryEntry {
  const id = generateId()

  db.prepare(`
    INSERT INTO inventory (id, user_id, item_id, name, rarity, price, stattrak, status, source, case_id, acquired_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, 'owned', ?, ?, ?)
  `).run(
    id,
    userId,
    item.id,
    item.name,
    item.rarity,
    item.price,
    item.stattrak ? 1 : 0,
    source,
    caseId,
    now.getTime()
  )

  logger.debug({ userId, entryId: id, itemId: item.id, source }, 'Granted item')

  return {
    id,
    userId,
    itemId: item.id,
    name: item.name,
    rarity: item.rarity,
    price: item.price,
    stattrak: item.stattrak,
    status: 'owned',
    source,
    caseId,
    acquiredAt: now,
  }
}

/**
 * Get a single entry by ID (any owner, any status)
 */
export function getInventoryEntry(db: Database, entryId: string): InventoryEntry | null {
  const row = db.prepare(`
    SELECT * FROM inventory WHERE id = ?
  `).get(entryId) as InventoryRow | undefined

  return row ? parseInventoryRow(row) : null
}

/**
 * Full inventory of a user, newest first
 */
export function getInventory(db: Database, userId: string): InventoryEntry[] {
  const rows = db.prepare(`
    SELECT * FROM inventory
    WHERE user_id = ?
    ORDER BY acquired_at DESC, rowid DESC
  `).all(userId) as InventoryRow[]

  return rows.map(parseInventoryRow)
}

/**
 * Resolve a selection of entry IDs that must all be owned by the user.
 * Throws InvalidSelectionError for empty, duplicated, foreign or spent entries.
 */
export function requireOwnedSelection(
  db: Database,
  userId: string,
  entryIds: readonly string[]
): InventoryEntry[] {
  if (entryIds.length === 0) {
    throw new InvalidSelectionError('no items selected')
  }

  if (new Set(entryIds).size !== entryIds.length) {
    throw new InvalidSelectionError('duplicate items in selection', [...entryIds])
  }

  const placeholders = entryIds.map(() => '?').join(',')
  const rows = db.prepare(`
    SELECT * FROM inventory
    WHERE user_id = ? AND status = 'owned' AND id IN (${placeholders})
  `).all(userId, ...entryIds) as InventoryRow[]

  if (rows.length !== entryIds.length) {
    const found = new Set(rows.map(r => r.id))
    throw new InvalidSelectionError(
      'items are missing or no longer owned',
      entryIds.filter(id => !found.has(id))
    )
  }

  // Keep the caller's order
  const byId = new Map(rows.map(r => [r.id, parseInventoryRow(r)]))
  return entryIds.map(id => {
    const entry = byId.get(id)
    if (!entry) {
      throw new InvariantViolationError('Selection lookup lost an entry', { entryId: id })
    }
    return entry
  })
}

/**
 * Move owned entries into a terminal status. Every entry must still be owned.
 */
export function closeEntries(
  db: Database,
  entryIds: readonly string[],
  status: Exclude<InventoryStatus, 'owned'>,
  now: Date
): void {
  const update = db.prepare(`
    UPDATE inventory SET status = ?, closed_at = ? WHERE id = ? AND status = 'owned'
  `)

  for (const id of entryIds) {
    const result = update.run(status, now.getTime(), id)
    if (result.changes !== 1) {
      throw new InvariantViolationError('Tried to close an entry that is not owned', { entryId: id, status })
    }
  }
}

/**
 * Sell an owned entry back for its price
 */
export function sellItem(
  db: Database,
  userId: string,
  entryId: string,
  now: Date = new Date()
): { entry: InventoryEntry; user: User; transactionId: string } {
  return withTransaction(db, () => {
    const entry = getInventoryEntry(db, entryId)
    if (!entry || entry.userId !== userId || entry.status !== 'owned') {
      throw new NotOwnedError(entryId)
    }

    closeEntries(db, [entry.id], 'sold', now)

    const credit = creditBalance(db, userId, entry.price, 'sell', now, {
      entryId: entry.id,
      itemId: entry.itemId,
    })

    logger.info({
      userId,
      entryId,
      price: entry.price,
      balanceAfter: credit.balanceAfter,
    }, 'Sold item')

    return {
      entry: { ...entry, status: 'sold' },
      user: requireUser(db, userId),
      transactionId: credit.transactionId,
    }
  })
}
