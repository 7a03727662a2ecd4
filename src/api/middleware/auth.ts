/**
 * Authentication Middleware
 * Resolves the bearer session token to a player
 */

import type { Request, Response, NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import { getUserByToken } from '../../services/user.js'
import { logger } from '../../utils/logger.js'

const PUBLIC_GET_PATHS = ['/api/v1/cases', '/api/v1/giveaways', '/api/v1/top', '/api/v1/feed']

/**
 * Routes that need no session
 */
export function isPublicPath(method: string, path: string): boolean {
  if (method === 'OPTIONS' || path === '/health') {
    return true
  }
  if (method === 'POST' && path === '/api/v1/auth/login') {
    return true
  }
  if (method !== 'GET') {
    return false
  }
  return PUBLIC_GET_PATHS.includes(path) || path.startsWith('/api/v1/cases/')
}

export function createAuthMiddleware(db: Database) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (isPublicPath(req.method, req.path)) {
      return next()
    }

    const authHeader = req.headers.authorization
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      logger.warn({ path: req.path, method: req.method }, 'Missing authorization header')
      res.status(401).json({
        error: 'UNAUTHORIZED',
        message: 'Missing or invalid authorization header',
      })
      return
    }

    const user = getUserByToken(db, authHeader.substring(7))
    if (!user) {
      logger.warn({ path: req.path, method: req.method }, 'Unknown session token')
      res.status(401).json({
        error: 'UNAUTHORIZED',
        message: 'Session expired or invalid',
      })
      return
    }

    res.locals.userId = user.id
    next()
  }
}
