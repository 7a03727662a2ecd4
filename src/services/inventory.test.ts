import { describe, it, expect, beforeEach } from 'vitest'
import type { Database } from 'better-sqlite3'
import type { Catalog } from '../types/index.js'
import {
  closeEntries,
  getInventory,
  getInventoryEntry,
  requireOwnedSelection,
  sellItem,
  toInventoryPayload,
} from './inventory.js'
import { getTransactionsForUser } from './transaction.js'
import { requireUser } from './user.js'
import { InvalidSelectionError, InvariantViolationError, NotOwnedError } from '../utils/errors.js'
import { createTestCatalog, createTestDb, createTestUser, giveItem } from '../testing/fixtures.js'

const NOW = new Date('2025-03-01T12:00:00Z')

describe('inventory', () => {
  let db: Database
  let catalog: Catalog
  let userId: string

  beforeEach(() => {
    db = createTestDb()
    catalog = createTestCatalog()
    userId = createTestUser(db, 'collector', 0, NOW).id
  })

  it('lists entries newest first', () => {
    const older = giveItem(db, catalog, userId, 'item-a', 'case', new Date('2025-03-01T10:00:00Z'))
    const newer = giveItem(db, catalog, userId, 'item-b', 'giveaway', new Date('2025-03-01T11:00:00Z'))

    expect(getInventory(db, userId).map(e => e.id)).toEqual([newer.id, older.id])
  })

  it('serializes entries for the API', () => {
    const entry = giveItem(db, catalog, userId, 'item-b', 'upgrade', NOW)

    expect(toInventoryPayload(entry)).toEqual({
      id: entry.id,
      itemId: 'item-b',
      name: 'Item B',
      rarity: 'rare',
      price: 500,
      stattrak: true,
      status: 'owned',
      source: 'upgrade',
      caseId: null,
      acquiredAt: '2025-03-01T12:00:00.000Z',
    })
  })

  it('returns a selection in the order requested', () => {
    const a = giveItem(db, catalog, userId, 'item-a')
    const b = giveItem(db, catalog, userId, 'item-b')

    expect(requireOwnedSelection(db, userId, [b.id, a.id]).map(e => e.itemId)).toEqual(['item-b', 'item-a'])
  })

  it('rejects selections that include spent entries', () => {
    const a = giveItem(db, catalog, userId, 'item-a')
    closeEntries(db, [a.id], 'failed', NOW)

    expect(() => requireOwnedSelection(db, userId, [a.id])).toThrow(InvalidSelectionError)
  })

  it('refuses to close an entry twice', () => {
    const a = giveItem(db, catalog, userId, 'item-a')
    closeEntries(db, [a.id], 'sold', NOW)

    expect(() => closeEntries(db, [a.id], 'upgraded', NOW)).toThrow(InvariantViolationError)
    expect(getInventoryEntry(db, a.id)?.status).toBe('sold')
  })
})

describe('sellItem', () => {
  let db: Database
  let catalog: Catalog
  let userId: string

  beforeEach(() => {
    db = createTestDb()
    catalog = createTestCatalog()
    userId = createTestUser(db, 'seller', 10, NOW).id
  })

  it('credits the price and marks the entry sold', () => {
    const entry = giveItem(db, catalog, userId, 'item-b')

    const result = sellItem(db, userId, entry.id, NOW)

    expect(result.entry.status).toBe('sold')
    expect(result.user.balance).toBe(510)
    expect(result.user.maxBalance).toBe(510)
    expect(getInventoryEntry(db, entry.id)?.status).toBe('sold')

    const [tx] = getTransactionsForUser(db, userId)
    expect(tx).toMatchObject({
      id: result.transactionId,
      type: 'sell',
      amount: 500,
      balanceAfter: 510,
      metadata: { entryId: entry.id, itemId: 'item-b' },
    })
  })

  it('rejects entries that are sold, foreign or missing', () => {
    const entry = giveItem(db, catalog, userId, 'item-a')
    sellItem(db, userId, entry.id, NOW)

    const other = createTestUser(db, 'other', 0, NOW)
    const theirs = giveItem(db, catalog, other.id, 'item-b')

    expect(() => sellItem(db, userId, entry.id, NOW)).toThrow(NotOwnedError)
    expect(() => sellItem(db, userId, theirs.id, NOW)).toThrow(NotOwnedError)
    expect(() => sellItem(db, userId, 'missing', NOW)).toThrow(NotOwnedError)

    expect(requireUser(db, userId).balance).toBe(60)
    expect(requireUser(db, other.id).balance).toBe(0)
  })
})
