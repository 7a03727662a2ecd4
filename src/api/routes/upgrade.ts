/**
 * Upgrade Routes
 * POST /upgrade/targets - items reachable from a selection at a chance
 * POST /upgrade/start - stake the selection
 */

import { Router, type Request, type Response, type NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import type { Catalog } from '../../types/index.js'
import type { UpgradeStartResponse, UpgradeTargetsResponse } from '../../types/api.js'
import { computeTargets, resolveUpgrade } from '../../services/upgrade.js'
import { toItemPayload } from '../../services/catalog.js'
import { toInventoryPayload } from '../../services/inventory.js'
import { buildUserPayload } from '../../services/user.js'
import type { LiveFeed } from '../../services/feed.js'
import {
  UpgradeStartSchema,
  UpgradeTargetsSchema,
  getSessionUserId,
  parseBody,
} from '../validation.js'

export function createUpgradeRouter(db: Database, catalog: Catalog, feed: LiveFeed): Router {
  const router = Router()

  router.post('/upgrade/targets', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { itemIds, chance } = parseBody(UpgradeTargetsSchema, req.body)
      const result = computeTargets(db, catalog, getSessionUserId(res), itemIds, chance)

      const response: UpgradeTargetsResponse = {
        value: result.value,
        chance: result.chance,
        ceiling: result.ceiling,
        targets: result.targets.map(toItemPayload),
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  router.post('/upgrade/start', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { itemIds, targetId, chance } = parseBody(UpgradeStartSchema, req.body)
      const result = resolveUpgrade(db, catalog, getSessionUserId(res), itemIds, targetId, chance)

      if (result.reward) {
        feed.recordDrop(result.user.nickname, result.reward)
      }

      const response: UpgradeStartResponse = {
        success: result.success,
        reward: result.reward ? toInventoryPayload(result.reward) : null,
        consolation: result.consolation,
        user: buildUserPayload(db, result.user),
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  return router
}
