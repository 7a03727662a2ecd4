/**
 * Live Drop Feed
 *
 * In-process ring buffer of recent drops. Entries are recorded by the API
 * layer after the producing transaction has committed.
 */

import type { Catalog, CatalogItem, InventoryEntry, InventorySource } from '../types/index.js'
import { pickOne, secureRandom, type RandomSource } from './random.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger({ module: 'feed' })

export interface FeedEntry {
  nickname: string
  item: string
  rarity: string
  price: number
  stattrak: boolean
  source: InventorySource
  at: Date
}

export class LiveFeed {
  private entries: FeedEntry[] = []

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`Feed limit must be a positive integer, got ${limit}`)
    }
  }

  record(entry: FeedEntry): void {
    this.entries.unshift(entry)
    if (this.entries.length > this.limit) {
      this.entries.length = this.limit
    }
  }

  recordDrop(nickname: string, drop: InventoryEntry): void {
    this.record({
      nickname,
      item: drop.name,
      rarity: drop.rarity,
      price: drop.price,
      stattrak: drop.stattrak,
      source: drop.source,
      at: drop.acquiredAt,
    })
  }

  /** Newest first */
  list(): FeedEntry[] {
    return [...this.entries]
  }

  get size(): number {
    return this.entries.length
  }
}

// ============================================================================
// Simulated activity
// ============================================================================

const NICKNAME_STEMS = ['Neo', 'Fox', 'Skull', 'Viper', 'Ghost', 'Raven', 'Blaze', 'Nova', 'Echo', 'Wolf']

const MIN_DELAY_MS = 5_000
const MAX_DELAY_MS = 8_000

export function randomNickname(source: RandomSource = secureRandom): string {
  const stem = pickOne(NICKNAME_STEMS, source)
  const suffix = 1 + Math.floor(source.next() * 999)
  return `${stem}${suffix}`
}

export function simulatedDrop(catalog: Catalog, source: RandomSource = secureRandom, now: Date = new Date()): FeedEntry {
  const item: CatalogItem = pickOne(catalog.items, source)
  return {
    nickname: randomNickname(source),
    item: item.name,
    rarity: item.rarity,
    price: item.price,
    stattrak: item.stattrak,
    source: 'case',
    at: now,
  }
}

export interface FeedSimulator {
  stop(): void
}

/**
 * Post a made-up drop every 5-8 seconds until stopped
 */
export function startFeedSimulator(
  feed: LiveFeed,
  catalog: Catalog,
  source: RandomSource = secureRandom
): FeedSimulator {
  let timer: NodeJS.Timeout | null = null
  let stopped = false

  const schedule = (): void => {
    const delay = MIN_DELAY_MS + Math.floor(source.next() * (MAX_DELAY_MS - MIN_DELAY_MS))
    timer = setTimeout(tick, delay)
  }

  const tick = (): void => {
    if (stopped) return
    if (catalog.items.length > 0) {
      const entry = simulatedDrop(catalog, source)
      feed.record(entry)
      log.debug({ nickname: entry.nickname, item: entry.item }, 'Simulated drop')
    }
    schedule()
  }

  schedule()
  log.info('Feed simulator started')

  return {
    stop() {
      stopped = true
      if (timer) {
        clearTimeout(timer)
        timer = null
      }
      log.info('Feed simulator stopped')
    },
  }
}
