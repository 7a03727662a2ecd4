import { describe, it, expect } from 'vitest'
import { getTopPlayers } from './leaderboard.js'
import { closeEntries } from './inventory.js'
import { createTestCatalog, createTestDb, createTestUser, giveItem } from '../testing/fixtures.js'

const NOW = new Date('2025-03-01T12:00:00Z')

describe('getTopPlayers', () => {
  it('ranks by balance plus the value of owned items', () => {
    const db = createTestDb()
    const catalog = createTestCatalog()

    const hoarder = createTestUser(db, 'hoarder', 100, NOW)
    giveItem(db, catalog, hoarder.id, 'item-b')
    const spent = giveItem(db, catalog, hoarder.id, 'target-400')
    closeEntries(db, [spent.id], 'failed', NOW)

    createTestUser(db, 'saver', 300, NOW)
    createTestUser(db, 'broke', 0, NOW)

    expect(getTopPlayers(db).map(p => [p.rank, p.nickname, p.total])).toEqual([
      [1, 'hoarder', 600],
      [2, 'saver', 300],
      [3, 'broke', 0],
    ])
  })

  it('honours the limit', () => {
    const db = createTestDb()
    createTestUser(db, 'a', 3, NOW)
    createTestUser(db, 'b', 2, NOW)
    createTestUser(db, 'c', 1, NOW)

    expect(getTopPlayers(db, 2).map(p => p.nickname)).toEqual(['a', 'b'])
  })
})
