/**
 * Upgrade Service
 * Stake owned items for a chance at a pricier catalog item
 *
 * Fairness band: at chance c, a selection worth V may target any item priced
 * within [V, V * 100 / c]. Both operations recompute the band server-side.
 */

import type { Database } from 'better-sqlite3'
import type { Catalog, CatalogItem, InventoryEntry, UpgradeChance, User } from '../types/index.js'
import { UPGRADE_CHANCES } from '../types/index.js'
import { withTransaction } from '../db/connection.js'
import { getEconomyConfig } from './config.js'
import { creditBalance } from './balance.js'
import { closeEntries, grantItem, requireOwnedSelection } from './inventory.js'
import { weightedTrial, secureRandom, type RandomSource } from './random.js'
import { recordBestItem, requireUser } from './user.js'
import {
  InvalidChanceError,
  TargetNoLongerEligibleError,
  UnknownItemError,
} from '../utils/errors.js'
import { logger } from '../utils/logger.js'

export interface UpgradeTargets {
  value: number
  chance: UpgradeChance
  ceiling: number
  targets: CatalogItem[]
}

export interface UpgradeResult {
  success: boolean
  target: CatalogItem
  staked: InventoryEntry[]
  reward: InventoryEntry | null
  consolation: number
  user: User
}

/**
 * Narrow a client-supplied chance to a supported tier
 */
export function parseUpgradeChance(chance: unknown): UpgradeChance {
  const tier = UPGRADE_CHANCES.find(c => c === chance)
  if (tier === undefined) {
    throw new InvalidChanceError(chance, UPGRADE_CHANCES)
  }
  return tier
}

/**
 * Highest target price allowed for a selection value at a given chance
 */
export function upgradeCeiling(value: number, chance: UpgradeChance): number {
  return (value * 100) / chance
}

/**
 * Whether a price lies inside the band. Compared without division so the
 * ceiling itself is never lost to rounding.
 */
export function isWithinUpgradeBand(price: number, value: number, chance: UpgradeChance): boolean {
  return value > 0 && price >= value && price * chance <= value * 100
}

/**
 * Catalog items inside the band, cheapest first, one per catalog ID
 */
export function findUpgradeTargets(
  catalog: Catalog,
  value: number,
  chance: UpgradeChance
): CatalogItem[] {
  const seen = new Set<string>()
  const targets: CatalogItem[] = []

  for (const item of catalog.items) {
    if (seen.has(item.id) || !isWithinUpgradeBand(item.price, value, chance)) {
      continue
    }
    seen.add(item.id)
    targets.push(item)
  }

  return targets.sort((a, b) => a.price - b.price || a.name.localeCompare(b.name))
}

function selectionValue(entries: readonly InventoryEntry[]): number {
  return entries.reduce((sum, entry) => sum + entry.price, 0)
}

/**
 * List the items a selection can be upgraded into
 */
export function computeTargets(
  db: Database,
  catalog: Catalog,
  userId: string,
  itemIds: readonly string[],
  chance: unknown
): UpgradeTargets {
  const tier = parseUpgradeChance(chance)
  const entries = requireOwnedSelection(db, userId, itemIds)
  const value = selectionValue(entries)

  return {
    value,
    chance: tier,
    ceiling: upgradeCeiling(value, tier),
    targets: findUpgradeTargets(catalog, value, tier),
  }
}

/**
 * Run an upgrade. The staked entries are spent whatever the outcome:
 * 'upgraded' on success, 'failed' on failure.
 */
export function resolveUpgrade(
  db: Database,
  catalog: Catalog,
  userId: string,
  itemIds: readonly string[],
  targetId: string,
  chance: unknown,
  now: Date = new Date(),
  source: RandomSource = secureRandom
): UpgradeResult {
  const tier = parseUpgradeChance(chance)
  const target = catalog.itemsById.get(targetId)
  if (!target) {
    throw new UnknownItemError(targetId)
  }

  const { consolationRate } = getEconomyConfig()

  return withTransaction(db, () => {
    // Selection and band are re-checked against current state
    const staked = requireOwnedSelection(db, userId, itemIds)
    const value = selectionValue(staked)

    if (!isWithinUpgradeBand(target.price, value, tier)) {
      throw new TargetNoLongerEligibleError(targetId, value, upgradeCeiling(value, tier))
    }

    const success = weightedTrial(tier, source)
    const stakedIds = staked.map(entry => entry.id)

    closeEntries(db, stakedIds, success ? 'upgraded' : 'failed', now)

    db.prepare(`
      UPDATE users
      SET upgrades = upgrades + 1,
          upgrade_wins = upgrade_wins + ?
      WHERE id = ?
    `).run(success ? 1 : 0, userId)

    let reward: InventoryEntry | null = null
    let consolation = 0

    if (success) {
      reward = grantItem(db, userId, target, 'upgrade', now)
      recordBestItem(db, userId, 'upgrade', reward)
    } else {
      consolation = value * consolationRate
      if (consolation > 0) {
        creditBalance(db, userId, consolation, 'upgrade_consolation', now, {
          targetId,
          chance: tier,
          stakedIds,
          value,
        })
      }
    }

    logger.info({
      userId,
      chance: tier,
      value,
      targetId,
      targetPrice: target.price,
      stakedIds,
      success,
      consolation,
    }, 'Upgrade resolved')

    return {
      success,
      target,
      staked: staked.map(entry => ({ ...entry, status: success ? 'upgraded' as const : 'failed' as const })),
      reward,
      consolation,
      user: requireUser(db, userId),
    }
  })
}
