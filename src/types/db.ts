/**
 * Database Row Types
 * These match the SQLite schema structure
 */

/**
 * Player record
 */
export interface UserRow {
  id: string               // UUID
  nickname: string
  token: string | null     // Current session token
  balance: number
  last_claim_at: number | null  // Epoch ms of last bonus claim
  cases_opened: number
  cases_won: number
  daily_cases: number
  daily_reset: string      // YYYY-MM-DD day key the daily counter belongs to
  upgrades: number
  upgrade_wins: number
  max_balance: number
  best_drop_id: string | null      // References inventory.id
  best_upgrade_id: string | null   // References inventory.id
  created_at: number
}

/**
 * Owned item instance
 */
export interface InventoryRow {
  id: string
  user_id: string
  item_id: string          // Catalog item ID
  name: string
  rarity: string
  price: number
  stattrak: number         // 0 | 1
  status: string
  source: string
  case_id: string | null
  acquired_at: number
  closed_at: number | null // When the entry left the owned state
}

/**
 * Ledger entry
 */
export interface TransactionRow {
  id: string
  timestamp: number
  type: string
  user_id: string
  amount: number
  balance_after: number
  metadata: string         // JSON object
}

/**
 * Giveaway record
 */
export interface GiveawayRow {
  id: string
  entry_price: number
  reward_item_id: string
  start_at: number
  resolved: number         // 0 | 1
  winner_id: string | null
  reward_entry_id: string | null
  resolved_at: number | null
  cancelled_at: number | null  // Closed without a draw, entries refunded
  created_at: number
}

/**
 * Giveaway entry (one per user per giveaway)
 */
export interface GiveawayEntryRow {
  giveaway_id: string
  user_id: string
  entry_price: number
  joined_at: number
}
