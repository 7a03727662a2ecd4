/**
 * Case Routes
 * GET /cases - catalog overview
 * GET /cases/:caseId/items - drop table with probabilities
 * POST /case/open - open a case
 */

import { Router, type Request, type Response, type NextFunction } from 'express'
import type { Database } from 'better-sqlite3'
import type { Catalog, CaseDefinition } from '../../types/index.js'
import type {
  CasePayload,
  GetCaseItemsResponse,
  GetCasesResponse,
  OpenCaseResponse,
} from '../../types/api.js'
import { describeDropTable, getCaseWithDropTable, toItemPayload } from '../../services/catalog.js'
import { openCase } from '../../services/cases.js'
import { toInventoryPayload } from '../../services/inventory.js'
import { buildUserPayload } from '../../services/user.js'
import type { LiveFeed } from '../../services/feed.js'
import { OpenCaseSchema, getSessionUserId, parseBody } from '../validation.js'

function toCasePayload(caseDef: CaseDefinition): CasePayload {
  return {
    id: caseDef.id,
    name: caseDef.name,
    category: caseDef.category,
    price: caseDef.price,
  }
}

export function createCasesRouter(db: Database, catalog: Catalog, feed: LiveFeed): Router {
  const router = Router()

  router.get('/cases', (_req: Request, res: Response) => {
    const response: GetCasesResponse = {
      cases: catalog.cases.map(toCasePayload),
      categories: catalog.categories,
      rarities: catalog.rarities.map(r => ({ id: r.id, label: r.label, color: r.color })),
    }
    res.json(response)
  })

  router.get('/cases/:caseId/items', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { caseDef } = getCaseWithDropTable(catalog, req.params.caseId)
      const response: GetCaseItemsResponse = {
        case: toCasePayload(caseDef),
        items: describeDropTable(catalog, caseDef.id).map(({ item, probability }) => ({
          ...toItemPayload(item),
          probability,
        })),
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  router.post('/case/open', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { caseId } = parseBody(OpenCaseSchema, req.body)
      const result = openCase(db, catalog, getSessionUserId(res), caseId)

      // Committed; safe to publish
      feed.recordDrop(result.user.nickname, result.drop)

      const response: OpenCaseResponse = {
        drop: toInventoryPayload(result.drop),
        casePrice: result.caseDef.price,
        user: buildUserPayload(db, result.user),
      }
      res.json(response)
    } catch (error) {
      next(error)
    }
  })

  return router
}
