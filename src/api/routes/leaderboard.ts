/**
 * Leaderboard and Feed Routes
 *
 * GET /top - richest players by balance plus owned item value
 * GET /feed - latest drops
 *
 * Query params (top):
 * - limit: number (default: 10, max: 100)
 */

import { Router, type Request, type Response, type NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import type { FeedResponse, TopPlayersResponse } from '../../types/api.js'
import {
  DEFAULT_LEADERBOARD_LIMIT,
  MAX_LEADERBOARD_LIMIT,
  getTopPlayers,
} from '../../services/leaderboard.js'
import type { LiveFeed } from '../../services/feed.js'
import { parseLimit } from '../validation.js'

export function createLeaderboardRouter(db: Database, feed: LiveFeed): Router {
  const router = Router()

  router.get('/top', (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = parseLimit(req.query.limit, DEFAULT_LEADERBOARD_LIMIT, 1, MAX_LEADERBOARD_LIMIT)

      const response: TopPlayersResponse = {
        players: getTopPlayers(db, limit).map(p => ({ nickname: p.nickname, total: p.total })),
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  router.get('/feed', (_req: Request, res: Response) => {
    const response: FeedResponse = {
      items: feed.list().map(entry => ({
        nickname: entry.nickname,
        item: entry.item,
        rarity: entry.rarity,
        price: entry.price,
        stattrak: entry.stattrak,
        source: entry.source,
        at: entry.at.toISOString(),
      })),
    }
    res.json(response)
  })

  return router
}
