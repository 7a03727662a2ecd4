import { describe, it, expect, beforeEach } from 'vitest'
import type { Database } from 'better-sqlite3'
import type { Catalog } from '../types/index.js'
import { openCase } from './cases.js'
import { getInventory } from './inventory.js'
import { getTransactionsForUser } from './transaction.js'
import { requireUser } from './user.js'
import { InsufficientFundsError, InvalidDropTableError, UnknownCaseError } from '../utils/errors.js'
import {
  createTestCatalog,
  createTestDb,
  createTestUser,
  failingRandom,
  fixedRandom,
} from '../testing/fixtures.js'

const NOW = new Date('2025-03-01T12:00:00Z')

describe('openCase', () => {
  let db: Database
  let catalog: Catalog
  let userId: string

  beforeEach(() => {
    db = createTestDb()
    catalog = createTestCatalog()
    userId = createTestUser(db, 'opener', 1000, NOW).id
  })

  it('debits the case price and grants the drawn item', () => {
    const result = openCase(db, catalog, userId, 'basic', NOW, fixedRandom(0.5))

    expect(result.caseDef.id).toBe('basic')
    expect(result.drop).toMatchObject({
      itemId: 'item-a',
      price: 50,
      status: 'owned',
      source: 'case',
      caseId: 'basic',
    })
    expect(result.user.balance).toBe(900)

    const inventory = getInventory(db, userId)
    expect(inventory.map(e => e.id)).toEqual([result.drop.id])

    const [tx] = getTransactionsForUser(db, userId)
    expect(tx).toMatchObject({
      type: 'case_open',
      amount: -100,
      balanceAfter: 900,
      metadata: { caseId: 'basic' },
    })
  })

  it('counts a win only when the drop is worth more than the case', () => {
    openCase(db, catalog, userId, 'basic', NOW, fixedRandom(0.5))
    const afterLoss = requireUser(db, userId)
    expect(afterLoss.casesOpened).toBe(1)
    expect(afterLoss.casesWon).toBe(0)

    openCase(db, catalog, userId, 'basic', NOW, fixedRandom(0.9))
    const afterWin = requireUser(db, userId)
    expect(afterWin.casesOpened).toBe(2)
    expect(afterWin.casesWon).toBe(1)
    expect(afterWin.balance).toBe(800)
    expect(afterWin.maxBalance).toBe(1000)
  })

  it('keeps the priciest drop as the best drop', () => {
    const big = openCase(db, catalog, userId, 'basic', NOW, fixedRandom(0.9))
    openCase(db, catalog, userId, 'basic', NOW, fixedRandom(0.1))

    expect(requireUser(db, userId).bestDropId).toBe(big.drop.id)
  })

  it('rolls back the debit when the draw fails', () => {
    expect(() => openCase(db, catalog, userId, 'basic', NOW, failingRandom)).toThrow('random source unavailable')

    const user = requireUser(db, userId)
    expect(user.balance).toBe(1000)
    expect(user.casesOpened).toBe(0)
    expect(getInventory(db, userId)).toEqual([])
    expect(getTransactionsForUser(db, userId)).toEqual([])
  })

  it('rejects a case the user cannot afford', () => {
    const poor = createTestUser(db, 'poor', 99, NOW)

    expect(() => openCase(db, catalog, poor.id, 'basic', NOW, fixedRandom(0.5))).toThrow(InsufficientFundsError)
    expect(requireUser(db, poor.id).balance).toBe(99)
    expect(getInventory(db, poor.id)).toEqual([])
  })

  it('rejects unknown and empty cases', () => {
    expect(() => openCase(db, catalog, userId, 'missing', NOW)).toThrow(UnknownCaseError)
    expect(() => openCase(db, catalog, userId, 'empty', NOW)).toThrow(InvalidDropTableError)
    expect(requireUser(db, userId).balance).toBe(1000)
  })

  it('resets the daily counter on a new day', () => {
    openCase(db, catalog, userId, 'basic', NOW, fixedRandom(0.5))
    openCase(db, catalog, userId, 'basic', NOW, fixedRandom(0.5))
    expect(requireUser(db, userId).dailyCases).toBe(2)

    const nextDay = new Date('2025-03-02T00:30:00Z')
    const result = openCase(db, catalog, userId, 'basic', nextDay, fixedRandom(0.5))
    expect(result.user.dailyCases).toBe(1)
    expect(result.user.dailyReset).toBe('2025-03-02')
  })
})
