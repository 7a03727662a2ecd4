/**
 * API Request/Response Types
 */

// ============================================================================
// Shared payloads
// ============================================================================

export interface ItemPayload {
  id: string
  name: string
  rarity: string
  price: number
  stattrak: boolean
}

export interface InventoryItemPayload extends ItemPayload {
  itemId: string           // Catalog item ID (id is the instance ID)
  status: string
  source: string
  caseId: string | null
  acquiredAt: string       // ISO timestamp
}

export interface UserStatsPayload {
  casesOpened: number
  casesWon: number
  dailyCases: number
  upgrades: number
  upgradeWins: number
  maxBalance: number
  bestDrop: InventoryItemPayload | null
  bestUpgrade: InventoryItemPayload | null
}

export interface UserPayload {
  id: string
  nickname: string
  balance: number
  lastClaimAt: string | null
  nextClaimAt: string | null  // ISO timestamp when the bonus becomes claimable, null if never claimed
  stats: UserStatsPayload
  inventory: InventoryItemPayload[]
}

// ============================================================================
// POST /auth/login
// ============================================================================

export interface LoginResponse {
  token: string
  user: UserPayload
}

// ============================================================================
// GET /cases, GET /cases/:caseId/items
// ============================================================================

export interface CasePayload {
  id: string
  name: string
  category: string
  price: number
}

export interface RarityPayload {
  id: string
  label: string
  color: string
}

export interface GetCasesResponse {
  cases: CasePayload[]
  categories: string[]
  rarities: RarityPayload[]
}

export interface GetCaseItemsResponse {
  case: CasePayload
  items: Array<ItemPayload & { probability: number }>
}

// ============================================================================
// POST /case/open
// ============================================================================

export interface OpenCaseResponse {
  drop: InventoryItemPayload
  casePrice: number
  user: UserPayload
}

// ============================================================================
// POST /upgrade/targets, POST /upgrade/start
// ============================================================================

export interface UpgradeTargetsResponse {
  value: number
  chance: number
  ceiling: number
  targets: ItemPayload[]
}

export interface UpgradeStartResponse {
  success: boolean
  reward: InventoryItemPayload | null
  consolation: number
  user: UserPayload
}

// ============================================================================
// POST /item/sell, POST /balance/claim
// ============================================================================

export interface UserResponse {
  user: UserPayload
}

export interface ClaimBonusResponse {
  amount: number
  nextClaimAt: string
  user: UserPayload
}

// ============================================================================
// GET /history
// ============================================================================

export interface TransactionHistoryItem {
  id: string
  timestamp: string
  type: string
  amount: number
  balanceAfter: number
  metadata: Record<string, unknown>
}

export interface GetHistoryResponse {
  transactions: TransactionHistoryItem[]
}

// ============================================================================
// Giveaways and notifications
// ============================================================================

export interface GiveawayPayload {
  id: string
  entryPrice: number
  startAt: string
  participants: number
  reward: ItemPayload
}

export interface GetGiveawaysResponse {
  giveaways: GiveawayPayload[]
}

export interface NotificationPayload {
  id: string               // Giveaway ID
  startAt: string
  entryPrice: number
  status: 'upcoming' | 'resolved'
  won: boolean
  reward: ItemPayload
}

export interface GetNotificationsResponse {
  notifications: NotificationPayload[]
}

// ============================================================================
// Leaderboard and feed
// ============================================================================

export interface TopPlayersResponse {
  players: Array<{ nickname: string; total: number }>
}

export interface FeedItemPayload {
  nickname: string
  item: string
  rarity: string
  price: number
  stattrak: boolean
  source: string
  at: string
}

export interface FeedResponse {
  items: FeedItemPayload[]
}

// ============================================================================
// Error Response
// ============================================================================

export interface ErrorResponse {
  error: string      // Error code (e.g., 'INSUFFICIENT_FUNDS')
  message: string    // Human-readable message
  details?: Record<string, unknown>
}

// ============================================================================
// Health Check
// ============================================================================

export interface HealthResponse {
  status: 'ok' | 'error'
  version: string
  uptime: number
}
