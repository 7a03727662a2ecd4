/**
 * Giveaway Routes
 * GET /giveaways - open giveaways
 * POST /giveaways/join - buy a ticket
 * GET /notifications - the caller's giveaway participations
 */

import { Router, type Request, type Response, type NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import type { Catalog } from '../../types/index.js'
import type {
  GetGiveawaysResponse,
  GetNotificationsResponse,
  UserResponse,
} from '../../types/api.js'
import { joinGiveaway, listGiveaways } from '../../services/giveaways.js'
import { getGiveawayNotifications } from '../../services/notifications.js'
import { toItemPayload } from '../../services/catalog.js'
import { buildUserPayload } from '../../services/user.js'
import { JoinGiveawaySchema, getSessionUserId, parseBody } from '../validation.js'

export function createGiveawaysRouter(db: Database, catalog: Catalog): Router {
  const router = Router()

  router.get('/giveaways', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const response: GetGiveawaysResponse = {
        giveaways: listGiveaways(db, catalog).map(({ giveaway, reward, participants }) => ({
          id: giveaway.id,
          entryPrice: giveaway.entryPrice,
          startAt: giveaway.startAt.toISOString(),
          participants,
          reward: toItemPayload(reward),
        })),
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  router.post('/giveaways/join', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { giveawayId } = parseBody(JoinGiveawaySchema, req.body)
      const result = joinGiveaway(db, getSessionUserId(res), giveawayId)

      const response: UserResponse = {
        user: buildUserPayload(db, result.user),
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  router.get('/notifications', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const notifications = getGiveawayNotifications(db, catalog, getSessionUserId(res))

      const response: GetNotificationsResponse = {
        notifications: notifications.map(n => ({
          id: n.giveawayId,
          startAt: n.startAt.toISOString(),
          entryPrice: n.entryPrice,
          status: n.status,
          won: n.won,
          reward: toItemPayload(n.reward),
        })),
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  return router
}
