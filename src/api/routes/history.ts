/**
 * History Route
 * GET /history - the caller's ledger, newest first
 */

import { Router, type Request, type Response, type NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import type { GetHistoryResponse, TransactionHistoryItem } from '../../types/api.js'
import { getTransactionsForUser } from '../../services/transaction.js'
import { getSessionUserId, parseLimit } from '../validation.js'

export function createHistoryRouter(db: Database): Router {
  const router = Router()

  router.get('/history', (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = parseLimit(req.query.limit, 20, 1, 100)
      const transactions = getTransactionsForUser(db, getSessionUserId(res), limit)

      const response: GetHistoryResponse = {
        transactions: transactions.map((tx): TransactionHistoryItem => ({
          id: tx.id,
          timestamp: tx.timestamp.toISOString(),
          type: tx.type,
          amount: tx.amount,
          balanceAfter: tx.balanceAfter,
          metadata: tx.metadata,
        })),
      }

      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  return router
}
