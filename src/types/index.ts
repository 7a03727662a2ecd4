/**
 * Lootcase Core Type Definitions
 */

// Re-export all types
export * from './db.js'
export * from './api.js'

/**
 * Transaction types for the ledger
 */
export type TransactionType =
  | 'case_open'            // Case price debited
  | 'sell'                 // Item sold back
  | 'upgrade_consolation'  // Partial refund on a failed upgrade
  | 'bonus'                // Periodic free bonus
  | 'giveaway_entry'       // Giveaway ticket purchase
  | 'giveaway_refund'      // Ticket refunded when a giveaway is cancelled

/**
 * Lifecycle of an owned item instance. Only 'owned' is non-terminal.
 */
export type InventoryStatus = 'owned' | 'sold' | 'upgraded' | 'failed'

/**
 * Where an inventory entry came from
 */
export type InventorySource = 'case' | 'upgrade' | 'giveaway'

/**
 * Rarity tier; weight drives case drop odds, rank orders tiers (0 = most common)
 */
export interface Rarity {
  id: string
  label: string
  color: string
  weight: number
  rank: number
}

/**
 * Immutable catalog entry
 */
export interface CatalogItem {
  id: string
  name: string
  rarity: string
  price: number
  stattrak: boolean
  caseIds: string[]
}

/**
 * Purchasable case
 */
export interface CaseDefinition {
  id: string
  name: string
  category: string
  price: number
}

export interface DropTableEntry {
  item: CatalogItem
  weight: number
}

/**
 * Loaded catalog with lookup maps and precomputed drop tables
 */
export interface Catalog {
  rarities: Rarity[]
  cases: CaseDefinition[]
  items: CatalogItem[]
  categories: string[]
  casesById: ReadonlyMap<string, CaseDefinition>
  itemsById: ReadonlyMap<string, CatalogItem>
  raritiesById: ReadonlyMap<string, Rarity>
  dropTables: ReadonlyMap<string, readonly DropTableEntry[]>
}

/**
 * Owned item instance
 */
export interface InventoryEntry {
  id: string
  userId: string
  itemId: string
  name: string
  rarity: string
  price: number
  stattrak: boolean
  status: InventoryStatus
  source: InventorySource
  caseId: string | null
  acquiredAt: Date
}

/**
 * Player account (without inventory)
 */
export interface User {
  id: string
  nickname: string
  balance: number
  lastClaimAt: Date | null
  casesOpened: number
  casesWon: number
  dailyCases: number
  dailyReset: string
  upgrades: number
  upgradeWins: number
  maxBalance: number
  bestDropId: string | null
  bestUpgradeId: string | null
  createdAt: Date
}

/**
 * Ledger entry
 */
export interface Transaction {
  id: string
  timestamp: Date
  type: TransactionType
  userId: string
  amount: number
  balanceAfter: number
  metadata: Record<string, unknown>
}

/**
 * Giveaway state
 */
export interface Giveaway {
  id: string
  entryPrice: number
  rewardItemId: string
  startAt: Date
  resolved: boolean
  winnerId: string | null
  rewardEntryId: string | null
  resolvedAt: Date | null
  cancelledAt: Date | null
}

/**
 * Economy settings (env-overridable, see services/config.ts)
 */
export interface EconomyConfig {
  startingBalance: number        // Balance of a new player (default: 500)
  bonusAmount: number            // Credited by a bonus claim (default: 100)
  bonusCooldownMinutes: number   // Minimum gap between claims (default: 20)
  consolationRate: number        // Fraction of staked value refunded on a failed upgrade (default: 0.05)
  giveawayIntervalHours: number  // Spacing of giveaway slots (default: 5)
  giveawayEntryPrices: number[]  // Entry prices, cycled by slot number (default: [199, 349, 549])
  giveawayCount: number          // Upcoming slots kept scheduled (default: 3)
  giveawayRarities: string[]     // Rarity pool for giveaway rewards
  feedLimit: number              // Live feed length (default: 16)
  dailyResetTimeZone: string     // Day boundary for the daily case counter (default: UTC)
}

/**
 * API server configuration
 */
export interface ApiConfig {
  port: number
  databasePath: string
}

/**
 * Supported upgrade odds, in percent
 */
export const UPGRADE_CHANCES = [15, 25, 30, 50, 75] as const

export type UpgradeChance = typeof UPGRADE_CHANCES[number]

/**
 * Default economy configuration values
 */
export const DEFAULT_ECONOMY_CONFIG: EconomyConfig = {
  startingBalance: 500,
  bonusAmount: 100,
  bonusCooldownMinutes: 20,
  consolationRate: 0.05,
  giveawayIntervalHours: 5,
  giveawayEntryPrices: [199, 349, 549],
  giveawayCount: 3,
  giveawayRarities: ['classified', 'covert', 'extraordinary'],
  feedLimit: 16,
  dailyResetTimeZone: 'UTC',
}
