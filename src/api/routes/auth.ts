/**
 * Session Routes
 * POST /auth/login - log in (or sign up) by nickname
 * GET /me - current player snapshot
 */

import { Router, type Request, type Response, type NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import type { LoginResponse, UserResponse } from '../../types/api.js'
import { buildUserPayload, getUserSnapshot, loginUser } from '../../services/user.js'
import { LoginSchema, getSessionUserId, parseBody } from '../validation.js'

export function createAuthRouter(db: Database): Router {
  const router = Router()

  router.post('/auth/login', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { nickname } = parseBody(LoginSchema, req.body)
      const { token, user } = loginUser(db, nickname)

      const response: LoginResponse = {
        token,
        user: buildUserPayload(db, user),
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  router.get('/me', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const response: UserResponse = {
        user: getUserSnapshot(db, getSessionUserId(res)),
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  return router
}
