import { describe, it, expect, beforeEach } from 'vitest'
import type { Database } from 'better-sqlite3'
import { claimBonus, creditBalance, debitBalance, getNextClaimAt } from './balance.js'
import { getTransactionsForUser } from './transaction.js'
import { requireUser } from './user.js'
import {
  CooldownActiveError,
  InsufficientFundsError,
  InvariantViolationError,
} from '../utils/errors.js'
import { createTestDb, createTestUser } from '../testing/fixtures.js'

const NOW = new Date('2025-03-01T12:00:00Z')
const minutes = (n: number): Date => new Date(NOW.getTime() + n * 60 * 1000)

describe('debitBalance / creditBalance', () => {
  let db: Database
  let userId: string

  beforeEach(() => {
    db = createTestDb()
    userId = createTestUser(db, 'saver', 200, NOW).id
  })

  it('records a ledger row for each change', () => {
    const credit = creditBalance(db, userId, 75.5, 'sell', NOW, { entryId: 'e1' })
    expect(credit.balanceAfter).toBe(275.5)

    const [tx] = getTransactionsForUser(db, userId)
    expect(tx).toMatchObject({
      id: credit.transactionId,
      type: 'sell',
      userId,
      amount: 75.5,
      balanceAfter: 275.5,
      metadata: { entryId: 'e1' },
    })
    expect(tx.timestamp.toISOString()).toBe('2025-03-01T12:00:00.000Z')

    const debit = debitBalance(db, userId, 100, 'case_open', NOW)
    expect(debit.balanceAfter).toBe(175.5)
    const [latest] = getTransactionsForUser(db, userId)
    expect(latest).toMatchObject({ id: debit.transactionId, amount: -100 })
  })

  it('tracks the highest balance ever held', () => {
    creditBalance(db, userId, 300, 'sell', NOW)
    debitBalance(db, userId, 400, 'case_open', NOW)

    const user = requireUser(db, userId)
    expect(user.balance).toBe(100)
    expect(user.maxBalance).toBe(500)
  })

  it('refuses to overdraw', () => {
    expect(() => debitBalance(db, userId, 200.01, 'case_open', NOW)).toThrow(InsufficientFundsError)
    expect(requireUser(db, userId).balance).toBe(200)
  })

  it('treats negative amounts as a programming error', () => {
    expect(() => creditBalance(db, userId, -1, 'sell', NOW)).toThrow(InvariantViolationError)
    expect(() => debitBalance(db, userId, Number.NaN, 'case_open', NOW)).toThrow(InvariantViolationError)
  })

  it('lists the ledger newest first', () => {
    creditBalance(db, userId, 10, 'sell', NOW)
    debitBalance(db, userId, 20, 'case_open', minutes(1))

    expect(getTransactionsForUser(db, userId).map(tx => tx.amount)).toEqual([-20, 10])
    expect(getTransactionsForUser(db, userId, 1)).toHaveLength(1)
  })
})

describe('claimBonus', () => {
  let db: Database
  let userId: string

  beforeEach(() => {
    db = createTestDb()
    userId = createTestUser(db, 'claimer', 0, NOW).id
  })

  it('lets a user who never claimed claim immediately', () => {
    expect(getNextClaimAt(requireUser(db, userId))).toBeNull()

    const result = claimBonus(db, userId, NOW)

    expect(result.amount).toBe(100)
    expect(result.balanceAfter).toBe(100)
    expect(result.nextClaimAt.toISOString()).toBe('2025-03-01T12:20:00.000Z')
    expect(result.user.lastClaimAt?.toISOString()).toBe('2025-03-01T12:00:00.000Z')
  })

  it('rejects claims inside the cooldown with the next claim time', () => {
    claimBonus(db, userId, NOW)

    let error: unknown
    try {
      claimBonus(db, userId, minutes(19))
    } catch (e) {
      error = e
    }

    expect(error).toBeInstanceOf(CooldownActiveError)
    if (error instanceof CooldownActiveError) {
      expect(error.httpStatus).toBe(429)
      expect(error.details).toEqual({ nextClaimAt: '2025-03-01T12:20:00.000Z' })
    }
    expect(requireUser(db, userId).balance).toBe(100)
  })

  it('allows the next claim once the cooldown has elapsed', () => {
    claimBonus(db, userId, NOW)
    const second = claimBonus(db, userId, minutes(20))

    expect(second.balanceAfter).toBe(200)
    expect(second.user.maxBalance).toBe(200)
  })
})
