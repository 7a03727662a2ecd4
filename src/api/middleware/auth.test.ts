import { describe, it, expect } from 'vitest'
import { isPublicPath } from './auth.js'

describe('isPublicPath', () => {
  it('lets catalog, giveaway listing, leaderboard and feed reads through', () => {
    expect(isPublicPath('GET', '/health')).toBe(true)
    expect(isPublicPath('GET', '/api/v1/cases')).toBe(true)
    expect(isPublicPath('GET', '/api/v1/cases/basic/items')).toBe(true)
    expect(isPublicPath('GET', '/api/v1/giveaways')).toBe(true)
    expect(isPublicPath('GET', '/api/v1/top')).toBe(true)
    expect(isPublicPath('GET', '/api/v1/feed')).toBe(true)
    expect(isPublicPath('POST', '/api/v1/auth/login')).toBe(true)
    expect(isPublicPath('OPTIONS', '/api/v1/case/open')).toBe(true)
  })

  it('requires a session for everything that touches a player', () => {
    expect(isPublicPath('GET', '/api/v1/me')).toBe(false)
    expect(isPublicPath('GET', '/api/v1/history')).toBe(false)
    expect(isPublicPath('GET', '/api/v1/notifications')).toBe(false)
    expect(isPublicPath('POST', '/api/v1/case/open')).toBe(false)
    expect(isPublicPath('POST', '/api/v1/giveaways/join')).toBe(false)
    expect(isPublicPath('POST', '/api/v1/cases')).toBe(false)
  })
})
