/**
 * Balance Routes
 * POST /item/sell - sell an owned item at its price
 * POST /balance/claim - periodic bonus
 */

import { Router, type Request, type Response, type NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import type { ClaimBonusResponse, UserResponse } from '../../types/api.js'
import { claimBonus } from '../../services/balance.js'
import { sellItem } from '../../services/inventory.js'
import { buildUserPayload } from '../../services/user.js'
import { SellItemSchema, getSessionUserId, parseBody } from '../validation.js'

export function createBalanceRouter(db: Database): Router {
  const router = Router()

  router.post('/item/sell', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { itemId } = parseBody(SellItemSchema, req.body)
      const result = sellItem(db, getSessionUserId(res), itemId)

      const response: UserResponse = {
        user: buildUserPayload(db, result.user),
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  router.post('/balance/claim', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = claimBonus(db, getSessionUserId(res))

      const response: ClaimBonusResponse = {
        amount: result.amount,
        nextClaimAt: result.nextClaimAt.toISOString(),
        user: buildUserPayload(db, result.user),
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  return router
}
