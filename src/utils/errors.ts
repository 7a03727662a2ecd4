/**
 * Lootcase Error Classes
 */

import type { ErrorResponse } from '../types/api.js'

/**
 * Base error class for Lootcase
 */
export class LootcaseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly httpStatus: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'LootcaseError'
  }

  /**
   * Convert to API error response format
   */
  toResponse(): ErrorResponse {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
    }
  }
}

/**
 * Insufficient funds error (402)
 */
export class InsufficientFundsError extends LootcaseError {
  constructor(required: number, available: number) {
    super(
      'Not enough balance for this operation',
      'INSUFFICIENT_FUNDS',
      402,
      { required, available }
    )
    this.name = 'InsufficientFundsError'
  }
}

/**
 * Upgrade selection is empty, duplicated, or references items the user doesn't own (400)
 */
export class InvalidSelectionError extends LootcaseError {
  constructor(reason: string, itemIds?: string[]) {
    super(
      `Invalid selection: ${reason}`,
      'INVALID_SELECTION',
      400,
      itemIds ? { reason, itemIds } : { reason }
    )
    this.name = 'InvalidSelectionError'
  }
}

/**
 * Upgrade chance outside the supported tiers (400)
 */
export class InvalidChanceError extends LootcaseError {
  constructor(chance: unknown, allowed: readonly number[]) {
    super(
      `Unsupported upgrade chance: ${String(chance)}`,
      'INVALID_CHANCE',
      400,
      { chance, allowed: [...allowed] }
    )
    this.name = 'InvalidChanceError'
  }
}

/**
 * Upgrade target is outside the band for the current selection (409)
 */
export class TargetNoLongerEligibleError extends LootcaseError {
  constructor(targetId: string, value: number, ceiling: number) {
    super(
      'Target is not eligible for the current selection and chance',
      'TARGET_NO_LONGER_ELIGIBLE',
      409,
      { targetId, value, ceiling }
    )
    this.name = 'TargetNoLongerEligibleError'
  }
}

/**
 * Inventory entry missing or not in owned state (404)
 */
export class NotOwnedError extends LootcaseError {
  constructor(entryId: string) {
    super(
      `Item ${entryId} is not in your inventory`,
      'NOT_OWNED',
      404,
      { entryId }
    )
    this.name = 'NotOwnedError'
  }
}

/**
 * Bonus claimed again before the cooldown elapsed (429)
 */
export class CooldownActiveError extends LootcaseError {
  constructor(nextClaimAt: Date) {
    super(
      'Bonus is on cooldown',
      'COOLDOWN_ACTIVE',
      429,
      { nextClaimAt: nextClaimAt.toISOString() }
    )
    this.name = 'CooldownActiveError'
  }
}

/**
 * User already entered this giveaway (409)
 */
export class AlreadyJoinedError extends LootcaseError {
  constructor(giveawayId: string) {
    super(
      'You already joined this giveaway',
      'ALREADY_JOINED',
      409,
      { giveawayId }
    )
    this.name = 'AlreadyJoinedError'
  }
}

/**
 * Giveaway deadline passed or already drawn (409)
 */
export class GiveawayClosedError extends LootcaseError {
  constructor(giveawayId: string) {
    super(
      'Giveaway is closed',
      'GIVEAWAY_CLOSED',
      409,
      { giveawayId }
    )
    this.name = 'GiveawayClosedError'
  }
}

/**
 * Giveaway resolution requested before its deadline (409)
 */
export class GiveawayNotDueError extends LootcaseError {
  constructor(giveawayId: string, startAt: Date) {
    super(
      `Giveaway ${giveawayId} cannot be drawn before ${startAt.toISOString()}`,
      'GIVEAWAY_NOT_DUE',
      409,
      { giveawayId, startAt: startAt.toISOString() }
    )
    this.name = 'GiveawayNotDueError'
  }
}

/**
 * Case not found error (404)
 */
export class UnknownCaseError extends LootcaseError {
  constructor(caseId: string) {
    super(
      `Case ${caseId} not found`,
      'UNKNOWN_CASE',
      404,
      { caseId }
    )
    this.name = 'UnknownCaseError'
  }
}

/**
 * Catalog item not found error (404)
 */
export class UnknownItemError extends LootcaseError {
  constructor(itemId: string) {
    super(
      `Item ${itemId} not found`,
      'UNKNOWN_ITEM',
      404,
      { itemId }
    )
    this.name = 'UnknownItemError'
  }
}

/**
 * Giveaway not found error (404)
 */
export class UnknownGiveawayError extends LootcaseError {
  constructor(giveawayId: string) {
    super(
      `Giveaway ${giveawayId} not found`,
      'UNKNOWN_GIVEAWAY',
      404,
      { giveawayId }
    )
    this.name = 'UnknownGiveawayError'
  }
}

/**
 * Drop table with no drawable weight (422)
 */
export class InvalidDropTableError extends LootcaseError {
  constructor(reason: string, caseId?: string) {
    super(
      `Invalid drop table: ${reason}`,
      'INVALID_DROP_TABLE',
      422,
      caseId ? { reason, caseId } : { reason }
    )
    this.name = 'InvalidDropTableError'
  }
}

/**
 * User not found error (404)
 */
export class UserNotFoundError extends LootcaseError {
  constructor(userId: string) {
    super(
      `User ${userId} not found`,
      'USER_NOT_FOUND',
      404,
      { userId }
    )
    this.name = 'UserNotFoundError'
  }
}

/**
 * Validation error (400)
 */
export class ValidationError extends LootcaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details)
    this.name = 'ValidationError'
  }
}

/**
 * Database error (500)
 */
export class DatabaseError extends LootcaseError {
  constructor(message: string, cause?: Error) {
    super(
      message,
      'DATABASE_ERROR',
      500,
      cause ? { cause: cause.message } : undefined
    )
    this.name = 'DatabaseError'
  }
}

/**
 * Broken internal invariant (negative balance, corrupted row).
 * Not a LootcaseError: the API answers a generic 500 and the request is not retried.
 */
export class InvariantViolationError extends Error {
  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message)
    this.name = 'InvariantViolationError'
  }
}
