import { describe, it, expect, vi, afterEach } from 'vitest'
import { LiveFeed, randomNickname, simulatedDrop, startFeedSimulator, type FeedEntry } from './feed.js'
import { createTestCatalog, fixedRandom } from '../testing/fixtures.js'

const NOW = new Date('2025-03-01T12:00:00Z')

function entry(nickname: string): FeedEntry {
  return { nickname, item: 'Item A', rarity: 'common', price: 50, stattrak: false, source: 'case', at: NOW }
}

describe('LiveFeed', () => {
  it('keeps the newest entries up to its limit', () => {
    const feed = new LiveFeed(2)
    feed.record(entry('one'))
    feed.record(entry('two'))
    feed.record(entry('three'))

    expect(feed.size).toBe(2)
    expect(feed.list().map(e => e.nickname)).toEqual(['three', 'two'])
  })

  it('hands out copies', () => {
    const feed = new LiveFeed(4)
    feed.record(entry('one'))
    feed.list().pop()
    expect(feed.size).toBe(1)
  })

  it('rejects a non-positive limit', () => {
    expect(() => new LiveFeed(0)).toThrow(RangeError)
  })
})

describe('simulated activity', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('builds nicknames from a stem and a number', () => {
    expect(randomNickname(fixedRandom(0))).toBe('Neo1')
    expect(randomNickname(fixedRandom(0.999))).toBe('Wolf999')
  })

  it('draws a catalog item for a made-up player', () => {
    expect(simulatedDrop(createTestCatalog(), fixedRandom(0), NOW)).toEqual({
      nickname: 'Neo1',
      item: 'Item A',
      rarity: 'common',
      price: 50,
      stattrak: false,
      source: 'case',
      at: NOW,
    })
  })

  it('posts on a timer until stopped', () => {
    vi.useFakeTimers()
    const feed = new LiveFeed(16)
    const simulator = startFeedSimulator(feed, createTestCatalog(), fixedRandom(0))

    vi.advanceTimersByTime(4999)
    expect(feed.size).toBe(0)

    vi.advanceTimersByTime(1)
    expect(feed.size).toBe(1)

    vi.advanceTimersByTime(5000)
    expect(feed.size).toBe(2)

    simulator.stop()
    vi.advanceTimersByTime(60_000)
    expect(feed.size).toBe(2)
  })
})
