import { describe, it, expect } from 'vitest'
import { ensureUpcomingGiveaways, joinGiveaway, resolveGiveaway } from './giveaways.js'
import { getGiveawayNotifications } from './notifications.js'
import { createTestCatalog, createTestDb, createTestUser, fixedRandom } from '../testing/fixtures.js'

const NOW = new Date('2025-03-01T12:00:00Z')

describe('getGiveawayNotifications', () => {
  it('lists participations newest first with their outcome', () => {
    const db = createTestDb()
    const catalog = createTestCatalog()
    const [first, second] = ensureUpcomingGiveaways(db, catalog, NOW, fixedRandom(0))
    const user = createTestUser(db, 'notified', 2000, NOW)

    joinGiveaway(db, user.id, first.id, NOW)
    joinGiveaway(db, user.id, second.id, new Date('2025-03-01T12:05:00Z'))
    resolveGiveaway(db, catalog, first.id, new Date('2025-03-01T13:00:00Z'), fixedRandom(0))

    const notifications = getGiveawayNotifications(db, catalog, user.id, new Date('2025-03-01T13:00:00Z'))

    expect(notifications.map(n => ({
      giveawayId: n.giveawayId,
      status: n.status,
      won: n.won,
      entryPrice: n.entryPrice,
      reward: n.reward.id,
    }))).toEqual([
      { giveawayId: second.id, status: 'upcoming', won: false, entryPrice: 199, reward: 'grand-600' },
      { giveawayId: first.id, status: 'resolved', won: true, entryPrice: 549, reward: 'grand-600' },
    ])
  })

  it('marks giveaways lost to another player', () => {
    const db = createTestDb()
    const catalog = createTestCatalog()
    const [first] = ensureUpcomingGiveaways(db, catalog, NOW, fixedRandom(0))
    const early = createTestUser(db, 'early', 1000, NOW)
    const late = createTestUser(db, 'late', 1000, NOW)

    joinGiveaway(db, early.id, first.id, NOW)
    joinGiveaway(db, late.id, first.id, new Date('2025-03-01T12:10:00Z'))
    // Participants are ordered by join time; 0 picks the first
    resolveGiveaway(db, catalog, first.id, new Date('2025-03-01T13:00:00Z'), fixedRandom(0))

    expect(getGiveawayNotifications(db, catalog, early.id).map(n => n.won)).toEqual([true])
    expect(getGiveawayNotifications(db, catalog, late.id).map(n => n.won)).toEqual([false])
  })

  it('stops reporting a giveaway as upcoming once its deadline passes', () => {
    const db = createTestDb()
    const catalog = createTestCatalog()
    const [first] = ensureUpcomingGiveaways(db, catalog, NOW, fixedRandom(0))
    const user = createTestUser(db, 'waiting', 1000, NOW)
    joinGiveaway(db, user.id, first.id, NOW)

    const before = getGiveawayNotifications(db, catalog, user.id, new Date('2025-03-01T12:59:59Z'))
    expect(before.map(n => [n.status, n.won])).toEqual([['upcoming', false]])

    // Deadline passed, not drawn yet
    const after = getGiveawayNotifications(db, catalog, user.id, new Date('2025-03-01T13:00:00Z'))
    expect(after.map(n => [n.status, n.won])).toEqual([['resolved', false]])
  })

  it('is empty for players who never joined', () => {
    const db = createTestDb()
    const user = createTestUser(db, 'idle', 0, NOW)
    expect(getGiveawayNotifications(db, createTestCatalog(), user.id)).toEqual([])
  })
})
