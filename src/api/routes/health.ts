/**
 * Health Route
 * GET /health - liveness plus a database ping
 */

import { Router, type Request, type Response } from 'express'
import type { Database } from 'better-sqlite3'
import type { HealthResponse } from '../../types/api.js'
import { logger } from '../../utils/logger.js'

const VERSION = '0.1.0'

function pingDatabase(db: Database): boolean {
  try {
    db.prepare('SELECT 1').get()
    return true
  } catch (error) {
    logger.error({ error }, 'Health check database ping failed')
    return false
  }
}

export function createHealthRouter(db: Database, getUptime: () => number): Router {
  const router = Router()

  router.get('/health', (_req: Request, res: Response) => {
    const healthy = pingDatabase(db)
    const response: HealthResponse = {
      status: healthy ? 'ok' : 'error',
      version: VERSION,
      uptime: getUptime(),
    }
    res.status(healthy ? 200 : 503).json(response)
  })

  return router
}
