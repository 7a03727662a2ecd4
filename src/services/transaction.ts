/**
 * Transaction Service
 * Handles transaction logging (audit trail)
 */

import type { Database } from 'better-sqlite3'
import type { Transaction, TransactionType, TransactionRow } from '../types/index.js'
import { generateId } from '../db/connection.js'
import { InvariantViolationError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

export interface CreateTransactionParams {
  type: TransactionType
  userId: string
  amount: number
  balanceAfter: number
  timestamp: Date
  metadata?: Record<string, unknown>
}

const TRANSACTION_TYPES: readonly TransactionType[] = [
  'case_open',
  'sell',
  'upgrade_consolation',
  'bonus',
  'giveaway_entry',
  'giveaway_refund',
]

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseTransactionRow(row: TransactionRow): Transaction {
  const type = TRANSACTION_TYPES.find(t => t === row.type)
  const metadata: unknown = JSON.parse(row.metadata)
  if (!type || !isRecord(metadata)) {
    throw new InvariantViolationError('Corrupted transaction row', { transactionId: row.id, type: row.type })
  }

  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    type,
    userId: row.user_id,
    amount: row.amount,
    balanceAfter: row.balance_after,
    metadata,
  }
}

/**
 * Create a new transaction record
 */
export function createTransaction(
  db: Database,
  params: CreateTransactionParams
): Transaction {
  const id = generateId()
  const metadata = params.metadata || {}

  db.prepare(`
    INSERT INTO transactions (id, timestamp, type, user_id, amount, balance_after, metadata)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    params.timestamp.getTime(),
    params.type,
    params.userId,
    params.amount,
    params.balanceAfter,
    JSON.stringify(metadata)
  )

  logger.debug({
    id,
    type: params.type,
    amount: params.amount,
    userId: params.userId,
  }, 'Created transaction')

  return {
    id,
    timestamp: params.timestamp,
    type: params.type,
    userId: params.userId,
    amount: params.amount,
    balanceAfter: params.balanceAfter,
    metadata,
  }
}

/**
 * Get transactions for a user, newest first
 */
export function getTransactionsForUser(
  db: Database,
  userId: string,
  limit: number = 20
): Transaction[] {
  const rows = db.prepare(`
    SELECT * FROM transactions
    WHERE user_id = ?
    ORDER BY timestamp DESC, rowid DESC
    LIMIT ?
  `).all(userId, limit) as TransactionRow[]

  return rows.map(parseTransactionRow)
}

