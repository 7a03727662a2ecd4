import { describe, it, expect } from 'vitest'
import {
  GiveawayNotDueError,
  InsufficientFundsError,
  InvalidChanceError,
  InvariantViolationError,
  LootcaseError,
} from './errors.js'
import { UPGRADE_CHANCES } from '../types/index.js'

describe('LootcaseError', () => {
  it('maps to the API error body', () => {
    const error = new InsufficientFundsError(100, 42.5)

    expect(error).toBeInstanceOf(LootcaseError)
    expect(error.httpStatus).toBe(402)
    expect(error.toResponse()).toEqual({
      error: 'INSUFFICIENT_FUNDS',
      message: 'Not enough balance for this operation',
      details: { required: 100, available: 42.5 },
    })
  })

  it('lists the supported chances', () => {
    expect(new InvalidChanceError(40, UPGRADE_CHANCES).details).toEqual({
      chance: 40,
      allowed: [15, 25, 30, 50, 75],
    })
  })

  it('serializes dates as ISO strings', () => {
    const error = new GiveawayNotDueError('g1', new Date('2025-03-01T13:00:00Z'))
    expect(error.details).toEqual({ giveawayId: 'g1', startAt: '2025-03-01T13:00:00.000Z' })
  })

  it('keeps invariant violations out of the API error hierarchy', () => {
    expect(new InvariantViolationError('broken')).not.toBeInstanceOf(LootcaseError)
  })
})
