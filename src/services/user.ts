/**
 * User Service
 * Handles player login, lookup, daily counters and snapshots
 */

import { randomBytes } from 'crypto'
import type { Database } from 'better-sqlite3'
import type { User, UserRow, UserPayload, InventoryEntry } from '../types/index.js'
import { generateId, withTransaction } from '../db/connection.js'
import { getEconomyConfig } from './config.js'
import { getNextClaimAt } from './balance.js'
import { getInventory, getInventoryEntry, toInventoryPayload } from './inventory.js'
import { getDayKey } from '../utils/timezone.js'
import { UserNotFoundError, ValidationError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

const MAX_NICKNAME_LENGTH = 32

/**
 * Parse a UserRow into a User domain object
 */
function parseUserRow(row: UserRow): User {
  return {
    id: row.id,
    nickname: row.nickname,
    balance: row.balance,
    lastClaimAt: row.last_claim_at !== null ? new Date(row.last_claim_at) : null,
    casesOpened: row.cases_opened,
    casesWon: row.cases_won,
    dailyCases: row.daily_cases,
    dailyReset: row.daily_reset,
    upgrades: row.upgrades,
    upgradeWins: row.upgrade_wins,
    maxBalance: row.max_balance,
    bestDropId: row.best_drop_id,
    bestUpgradeId: row.best_upgrade_id,
    createdAt: new Date(row.created_at),
  }
}

function generateToken(): string {
  return randomBytes(24).toString('base64url')
}

/**
 * Log in by nickname: creates the player on first login, otherwise rotates the token
 */
export function loginUser(
  db: Database,
  nickname: string,
  now: Date = new Date()
): { token: string; user: User } {
  const trimmed = nickname.trim()
  if (!trimmed) {
    throw new ValidationError('Nickname is required', { field: 'nickname' })
  }
  if (trimmed.length > MAX_NICKNAME_LENGTH) {
    throw new ValidationError(`Nickname must be at most ${MAX_NICKNAME_LENGTH} characters`, { field: 'nickname' })
  }

  const token = generateToken()

  return withTransaction(db, () => {
    const existing = db.prepare(`
      SELECT * FROM users WHERE nickname = ?
    `).get(trimmed) as UserRow | undefined

    if (existing) {
      db.prepare(`
        UPDATE users SET token = ? WHERE id = ?
      `).run(token, existing.id)

      logger.info({ userId: existing.id, nickname: trimmed }, 'User logged in')
      return { token, user: parseUserRow(existing) }
    }

    const id = generateId()
    const config = getEconomyConfig()

    db.prepare(`
      INSERT INTO users (id, nickname, token, balance, max_balance, daily_reset, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      trimmed,
      token,
      config.startingBalance,
      config.startingBalance,
      getDayKey(now, config.dailyResetTimeZone),
      now.getTime()
    )

    logger.info({ userId: id, nickname: trimmed, startingBalance: config.startingBalance }, 'Created new user')

    return { token, user: requireUser(db, id) }
  })
}

/**
 * Get user by internal ID (returns null if not found)
 */
export function getUserById(db: Database, id: string): User | null {
  const row = db.prepare(`
    SELECT * FROM users WHERE id = ?
  `).get(id) as UserRow | undefined

  return row ? parseUserRow(row) : null
}

/**
 * Get user by internal ID, throwing if missing
 */
export function requireUser(db: Database, id: string): User {
  const user = getUserById(db, id)
  if (!user) {
    throw new UserNotFoundError(id)
  }
  return user
}

/**
 * Resolve a session token to its user
 */
export function getUserByToken(db: Database, token: string): User | null {
  if (!token) {
    return null
  }

  const row = db.prepare(`
    SELECT * FROM users WHERE token = ?
  `).get(token) as UserRow | undefined

  return row ? parseUserRow(row) : null
}

/**
 * Zero the daily case counter when the day boundary has passed.
 * Call inside the operation's transaction.
 */
export function applyDailyReset(db: Database, user: User, now: Date): User {
  const today = getDayKey(now, getEconomyConfig().dailyResetTimeZone)
  if (user.dailyReset === today) {
    return user
  }

  db.prepare(`
    UPDATE users SET daily_cases = 0, daily_reset = ? WHERE id = ?
  `).run(today, user.id)

  logger.debug({ userId: user.id, previous: user.dailyReset, today }, 'Reset daily counters')

  return { ...user, dailyCases: 0, dailyReset: today }
}

/**
 * Replace the stored best drop / best upgrade if the new entry is pricier
 */
export function recordBestItem(
  db: Database,
  userId: string,
  kind: 'drop' | 'upgrade',
  entry: InventoryEntry
): boolean {
  const user = requireUser(db, userId)
  const currentId = kind === 'drop' ? user.bestDropId : user.bestUpgradeId
  const current = currentId ? getInventoryEntry(db, currentId) : null

  if (current && current.price >= entry.price) {
    return false
  }

  const column = kind === 'drop' ? 'best_drop_id' : 'best_upgrade_id'
  db.prepare(`
    UPDATE users SET ${column} = ? WHERE id = ?
  `).run(entry.id, userId)

  return true
}

/**
 * Build the API snapshot of a user: balance, stats and full inventory
 */
export function buildUserPayload(db: Database, user: User): UserPayload {
  const bestDrop = user.bestDropId ? getInventoryEntry(db, user.bestDropId) : null
  const bestUpgrade = user.bestUpgradeId ? getInventoryEntry(db, user.bestUpgradeId) : null
  const nextClaimAt = getNextClaimAt(user)

  return {
    id: user.id,
    nickname: user.nickname,
    balance: user.balance,
    lastClaimAt: user.lastClaimAt?.toISOString() ?? null,
    nextClaimAt: nextClaimAt?.toISOString() ?? null,
    stats: {
      casesOpened: user.casesOpened,
      casesWon: user.casesWon,
      dailyCases: user.dailyCases,
      upgrades: user.upgrades,
      upgradeWins: user.upgradeWins,
      maxBalance: user.maxBalance,
      bestDrop: bestDrop ? toInventoryPayload(bestDrop) : null,
      bestUpgrade: bestUpgrade ? toInventoryPayload(bestUpgrade) : null,
    },
    inventory: getInventory(db, user.id).map(toInventoryPayload),
  }
}

/**
 * Fresh snapshot of a user with the daily reset applied
 */
export function getUserSnapshot(db: Database, userId: string, now: Date = new Date()): UserPayload {
  return withTransaction(db, () => {
    const user = applyDailyReset(db, requireUser(db, userId), now)
    return buildUserPayload(db, user)
  })
}
