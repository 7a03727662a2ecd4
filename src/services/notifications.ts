/**
 * Giveaway Notifications
 *
 * Derived on read from the user's giveaway entries; nothing is stored.
 */

import type { Database } from 'better-sqlite3'
import type { Catalog, CatalogItem } from '../types/index.js'
import { logger } from '../utils/logger.js'

export type NotificationStatus = 'upcoming' | 'resolved'

export interface GiveawayNotification {
  giveawayId: string
  startAt: Date
  entryPrice: number
  status: NotificationStatus
  won: boolean
  reward: CatalogItem
  joinedAt: Date
}

interface NotificationRow {
  giveaway_id: string
  start_at: number
  entry_price: number
  resolved: number
  winner_id: string | null
  reward_item_id: string
  joined_at: number
}

/**
 * The user's giveaway participations, newest join first. A giveaway stops
 * being upcoming at its deadline, even before the scheduler has drawn it.
 */
export function getGiveawayNotifications(
  db: Database,
  catalog: Catalog,
  userId: string,
  now: Date = new Date()
): GiveawayNotification[] {
  const rows = db.prepare(`
    SELECT
      e.giveaway_id,
      g.start_at,
      e.entry_price,
      g.resolved,
      g.winner_id,
      g.reward_item_id,
      e.joined_at
    FROM giveaway_entries e
    JOIN giveaways g ON g.id = e.giveaway_id
    WHERE e.user_id = ?
    ORDER BY e.joined_at DESC, g.start_at DESC
  `).all(userId) as NotificationRow[]

  const notifications: GiveawayNotification[] = []
  for (const row of rows) {
    const reward = catalog.itemsById.get(row.reward_item_id)
    if (!reward) {
      logger.warn({ giveawayId: row.giveaway_id, rewardItemId: row.reward_item_id }, 'Notification reward missing from catalog')
      continue
    }

    const upcoming = row.resolved === 0 && row.start_at > now.getTime()
    notifications.push({
      giveawayId: row.giveaway_id,
      startAt: new Date(row.start_at),
      entryPrice: row.entry_price,
      status: upcoming ? 'upcoming' : 'resolved',
      won: row.resolved === 1 && row.winner_id === userId,
      reward,
      joinedAt: new Date(row.joined_at),
    })
  }

  return notifications
}
