/**
 * Case Service
 * Opening a case: debit, weighted draw and inventory credit in one transaction
 */

import type { Database } from 'better-sqlite3'
import type { Catalog, CaseDefinition, InventoryEntry, User } from '../types/index.js'
import { withTransaction } from '../db/connection.js'
import { getCaseWithDropTable } from './catalog.js'
import { debitBalance } from './balance.js'
import { grantItem } from './inventory.js'
import { weightedPick, secureRandom, type RandomSource } from './random.js'
import { applyDailyReset, recordBestItem, requireUser } from './user.js'
import { InsufficientFundsError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

export interface OpenCaseResult {
  caseDef: CaseDefinition
  drop: InventoryEntry
  user: User
}

/**
 * Open a case for a user.
 *
 * Nothing is visible until the debit, draw and grant have all committed;
 * an error anywhere rolls the whole operation back.
 */
export function openCase(
  db: Database,
  catalog: Catalog,
  userId: string,
  caseId: string,
  now: Date = new Date(),
  source: RandomSource = secureRandom
): OpenCaseResult {
  const { caseDef, dropTable } = getCaseWithDropTable(catalog, caseId)

  return withTransaction(db, () => {
    const user = applyDailyReset(db, requireUser(db, userId), now)

    if (user.balance < caseDef.price) {
      throw new InsufficientFundsError(caseDef.price, user.balance)
    }

    const debit = debitBalance(db, userId, caseDef.price, 'case_open', now, { caseId })

    const item = weightedPick(
      dropTable.map(entry => ({ value: entry.item, weight: entry.weight })),
      source
    )

    const drop = grantItem(db, userId, item, 'case', now, caseDef.id)
    const won = drop.price > caseDef.price

    db.prepare(`
      UPDATE users
      SET cases_opened = cases_opened + 1,
          cases_won = cases_won + ?,
          daily_cases = daily_cases + 1
      WHERE id = ?
    `).run(won ? 1 : 0, userId)

    recordBestItem(db, userId, 'drop', drop)

    logger.info({
      userId,
      caseId,
      casePrice: caseDef.price,
      itemId: item.id,
      dropPrice: drop.price,
      entryId: drop.id,
      balanceAfter: debit.balanceAfter,
    }, 'Case opened')

    return {
      caseDef,
      drop,
      user: requireUser(db, userId),
    }
  })
}
