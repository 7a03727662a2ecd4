/**
 * Balance Service
 * Core balance operations: debit, credit and the cooldown-gated bonus
 */

import type { Database } from 'better-sqlite3'
import type { TransactionType, User } from '../types/index.js'
import { getEconomyConfig } from './config.js'
import { createTransaction } from './transaction.js'
import { requireUser } from './user.js'
import { withTransaction } from '../db/connection.js'
import {
  CooldownActiveError,
  InsufficientFundsError,
  InvariantViolationError,
} from '../utils/errors.js'
import { logger } from '../utils/logger.js'

function assertAmount(amount: number, userId: string): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new InvariantViolationError('Balance change must be a non-negative amount', { userId, amount })
  }
}

function writeBalance(db: Database, userId: string, newBalance: number): void {
  if (newBalance < 0) {
    throw new InvariantViolationError('Balance would become negative', { userId, newBalance })
  }

  db.prepare(`
    UPDATE users
    SET balance = ?, max_balance = MAX(max_balance, ?)
    WHERE id = ?
  `).run(newBalance, newBalance, userId)
}

/**
 * Deduct currency from a user (atomic operation)
 * Returns the new balance and transaction ID
 */
export function debitBalance(
  db: Database,
  userId: string,
  amount: number,
  type: TransactionType,
  now: Date,
  metadata?: Record<string, unknown>
): { balanceAfter: number; transactionId: string } {
  assertAmount(amount, userId)

  return withTransaction(db, () => {
    const user = requireUser(db, userId)

    if (user.balance < amount) {
      throw new InsufficientFundsError(amount, user.balance)
    }

    const newBalance = user.balance - amount
    writeBalance(db, userId, newBalance)

    const transaction = createTransaction(db, {
      type,
      userId,
      amount: -amount,
      balanceAfter: newBalance,
      timestamp: now,
      metadata,
    })

    logger.debug({ userId, amount, balanceAfter: newBalance, type }, 'Debited balance')

    return {
      balanceAfter: newBalance,
      transactionId: transaction.id,
    }
  })
}

/**
 * Add currency to a user (sales, consolations, bonuses)
 */
export function creditBalance(
  db: Database,
  userId: string,
  amount: number,
  type: TransactionType,
  now: Date,
  metadata?: Record<string, unknown>
): { balanceAfter: number; transactionId: string } {
  assertAmount(amount, userId)

  return withTransaction(db, () => {
    const user = requireUser(db, userId)
    const newBalance = user.balance + amount
    writeBalance(db, userId, newBalance)

    const transaction = createTransaction(db, {
      type,
      userId,
      amount,
      balanceAfter: newBalance,
      timestamp: now,
      metadata,
    })

    logger.debug({ userId, amount, balanceAfter: newBalance, type }, 'Credited balance')

    return {
      balanceAfter: newBalance,
      transactionId: transaction.id,
    }
  })
}

/**
 * When the user may claim the bonus next
 */
export function getNextClaimAt(user: User): Date | null {
  if (!user.lastClaimAt) {
    return null
  }
  const cooldownMs = getEconomyConfig().bonusCooldownMinutes * 60 * 1000
  return new Date(user.lastClaimAt.getTime() + cooldownMs)
}

/**
 * Claim the periodic bonus. Fails with CooldownActiveError inside the cooldown window.
 */
export function claimBonus(
  db: Database,
  userId: string,
  now: Date = new Date()
): { amount: number; balanceAfter: number; nextClaimAt: Date; user: User } {
  const config = getEconomyConfig()

  return withTransaction(db, () => {
    const user = requireUser(db, userId)
    const nextClaimAt = getNextClaimAt(user)

    if (nextClaimAt && now.getTime() < nextClaimAt.getTime()) {
      throw new CooldownActiveError(nextClaimAt)
    }

    const credit = creditBalance(db, userId, config.bonusAmount, 'bonus', now)

    db.prepare(`
      UPDATE users SET last_claim_at = ? WHERE id = ?
    `).run(now.getTime(), userId)

    logger.info({
      userId,
      amount: config.bonusAmount,
      balanceAfter: credit.balanceAfter,
    }, 'Bonus claimed')

    return {
      amount: config.bonusAmount,
      balanceAfter: credit.balanceAfter,
      nextClaimAt: new Date(now.getTime() + config.bonusCooldownMinutes * 60 * 1000),
      user: requireUser(db, userId),
    }
  })
}
