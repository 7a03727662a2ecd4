/**
 * Test helpers: in-memory database, a small catalog and scripted randomness
 */

import type { Database } from 'better-sqlite3'
import type { Catalog, CatalogItem, InventoryEntry, InventorySource, User } from '../types/index.js'
import { initDatabase } from '../db/connection.js'
import { buildCatalog, type CatalogSource } from '../services/catalog.js'
import { grantItem } from '../services/inventory.js'
import type { RandomSource } from '../services/random.js'
import { loginUser, requireUser } from '../services/user.js'

export function createTestDb(): Database {
  return initDatabase(':memory:')
}

/**
 * basic (100): item-a 50 (weight 80) / item-b 500 (weight 20)
 * empty (10): nothing droppable
 * target-250, target-400 and grand-600 are upgrade or giveaway only
 */
export const TEST_CATALOG_SOURCE: CatalogSource = {
  rarities: [
    { id: 'common', label: 'Common', color: '#cccccc', weight: 80 },
    { id: 'rare', label: 'Rare', color: '#4b69ff', weight: 20 },
    { id: 'classified', label: 'Classified', color: '#d32ce6', weight: 4 },
  ],
  cases: [
    { id: 'basic', name: 'Basic Case', category: 'Test', price: 100 },
    { id: 'empty', name: 'Empty Case', price: 10 },
  ],
  items: [
    { id: 'item-a', name: 'Item A', rarity: 'common', price: 50, cases: ['basic'] },
    { id: 'item-b', name: 'Item B', rarity: 'rare', price: 500, stattrak: true, cases: ['basic'] },
    { id: 'item-100', name: 'Item 100', rarity: 'common', price: 100 },
    { id: 'item-150', name: 'Item 150', rarity: 'common', price: 150 },
    { id: 'target-250', name: 'Target 250', rarity: 'rare', price: 250 },
    { id: 'target-400', name: 'Target 400', rarity: 'rare', price: 400 },
    { id: 'grand-600', name: 'Grand 600', rarity: 'classified', price: 600 },
  ],
}

export function createTestCatalog(): Catalog {
  return buildCatalog(TEST_CATALOG_SOURCE)
}

/**
 * Replays the given values in order, then starts over
 */
export function sequenceRandom(values: readonly number[]): RandomSource {
  let index = 0
  return {
    next() {
      const value = values[index % values.length]
      index++
      return value
    },
  }
}

export function fixedRandom(value: number): RandomSource {
  return { next: () => value }
}

export const failingRandom: RandomSource = {
  next() {
    throw new Error('random source unavailable')
  },
}

/**
 * Log a player in and set their balance directly
 */
export function createTestUser(
  db: Database,
  nickname: string,
  balance: number,
  now: Date = new Date('2025-03-01T12:00:00Z')
): User {
  const { user } = loginUser(db, nickname, now)
  db.prepare(`UPDATE users SET balance = ?, max_balance = ? WHERE id = ?`).run(balance, balance, user.id)
  return requireUser(db, user.id)
}

export function requireCatalogItem(catalog: Catalog, itemId: string): CatalogItem {
  const item = catalog.itemsById.get(itemId)
  if (!item) {
    throw new Error(`Test catalog has no item ${itemId}`)
  }
  return item
}

export function giveItem(
  db: Database,
  catalog: Catalog,
  userId: string,
  itemId: string,
  source: InventorySource = 'case',
  now: Date = new Date('2025-03-01T12:00:00Z')
): InventoryEntry {
  return grantItem(db, userId, requireCatalogItem(catalog, itemId), source, now)
}
