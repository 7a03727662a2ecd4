/**
 * API Server
 * Express app exposing the loot economy over JSON
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express'
import type { Server } from 'http'
import type { Database } from 'better-sqlite3'
import type { ApiConfig, Catalog } from '../types/index.js'
import type { LiveFeed } from '../services/feed.js'
import { createAuthMiddleware } from './middleware/auth.js'
import { LootcaseError, ValidationError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

// Route handlers
import { createHealthRouter } from './routes/health.js'
import { createAuthRouter } from './routes/auth.js'
import { createCasesRouter } from './routes/cases.js'
import { createUpgradeRouter } from './routes/upgrade.js'
import { createBalanceRouter } from './routes/balance.js'
import { createHistoryRouter } from './routes/history.js'
import { createGiveawaysRouter } from './routes/giveaways.js'
import { createLeaderboardRouter } from './routes/leaderboard.js'

/**
 * express.json() rejects unparseable bodies with this error type
 */
function isMalformedBody(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed'
}

export class ApiServer {
  private app: Express
  private server: Server | null = null
  private startTime: Date

  constructor(
    private config: ApiConfig,
    private db: Database,
    private catalog: Catalog,
    private feed: LiveFeed
  ) {
    this.app = express()
    this.startTime = new Date()

    this.setupMiddleware()
    this.setupRoutes()
    this.setupErrorHandler()
  }

  private setupMiddleware(): void {
    this.app.use(express.json())

    // CORS headers
    this.app.use((req: Request, res: Response, next: NextFunction): void => {
      res.header('Access-Control-Allow-Origin', '*')
      res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS')
      res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization')

      if (req.method === 'OPTIONS') {
        res.sendStatus(200)
        return
      }
      next()
    })

    // Request logging
    this.app.use((req: Request, res: Response, next: NextFunction): void => {
      const start = Date.now()
      res.on('finish', () => {
        logger.debug({
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration: Date.now() - start,
        }, 'Request handled')
      })
      next()
    })

    this.app.use(createAuthMiddleware(this.db))
  }

  private setupRoutes(): void {
    this.app.use(createHealthRouter(this.db, () => this.getUptime()))

    const v1 = '/api/v1'
    this.app.use(v1, createAuthRouter(this.db))
    this.app.use(v1, createCasesRouter(this.db, this.catalog, this.feed))
    this.app.use(v1, createUpgradeRouter(this.db, this.catalog, this.feed))
    this.app.use(v1, createBalanceRouter(this.db))
    this.app.use(v1, createHistoryRouter(this.db))
    this.app.use(v1, createGiveawaysRouter(this.db, this.catalog))
    this.app.use(v1, createLeaderboardRouter(this.db, this.feed))

    this.app.use((req: Request, res: Response) => {
      res.status(404).json({
        error: 'NOT_FOUND',
        message: `Endpoint ${req.method} ${req.path} not found`,
      })
    })
  }

  private setupErrorHandler(): void {
    this.app.use((err: Error, req: Request, res: Response, _next: NextFunction): void => {
      const error = isMalformedBody(err) ? new ValidationError('Malformed JSON body') : err

      if (error instanceof LootcaseError) {
        // Rejected requests leave state untouched
        logger.debug({ code: error.code, path: req.path, method: req.method }, 'Request rejected')
        res.status(error.httpStatus).json(error.toResponse())
        return
      }

      logger.error({ error: err, path: req.path, method: req.method }, 'Unhandled error')
      res.status(500).json({
        error: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      })
    })
  }

  private getUptime(): number {
    return Math.floor((Date.now() - this.startTime.getTime()) / 1000)
  }

  /**
   * Resolves with the bound port (port 0 picks a free one)
   */
  async start(): Promise<number> {
    return new Promise((resolve) => {
      const server = this.app.listen(this.config.port, () => {
        const address = server.address()
        const port = typeof address === 'object' && address !== null ? address.port : this.config.port
        logger.info({ port }, 'API server started')
        resolve(port)
      })
      this.server = server
    })
  }

  async stop(): Promise<void> {
    const server = this.server
    if (!server) {
      return
    }

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error)
          return
        }
        this.server = null
        logger.info('API server stopped')
        resolve()
      })
    })
  }
}
