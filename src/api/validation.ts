/**
 * Request body schemas and helpers
 */

import type { Response } from 'express'
import { z } from 'zod'
import { ValidationError, InvariantViolationError } from '../utils/errors.js'

const ItemIdsSchema = z.array(z.string().min(1))

export const LoginSchema = z.object({
  nickname: z.string(),
})

export const OpenCaseSchema = z.object({
  caseId: z.string().min(1),
})

// Chance stays loose here; the upgrade service checks it against the whitelist
export const UpgradeTargetsSchema = z.object({
  itemIds: ItemIdsSchema,
  chance: z.number(),
})

export const UpgradeStartSchema = UpgradeTargetsSchema.extend({
  targetId: z.string().min(1),
})

export const SellItemSchema = z.object({
  itemId: z.string().min(1),
})

export const JoinGiveawaySchema = z.object({
  giveawayId: z.string().min(1),
})

/**
 * Validate a request body, failing with a 400 that lists the offending fields
 */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const validation = schema.safeParse(body)
  if (!validation.success) {
    throw new ValidationError('Invalid request body', {
      errors: validation.error.flatten().fieldErrors,
    })
  }
  return validation.data
}

/**
 * Integer query parameter clamped to [min, max]
 */
export function parseLimit(raw: unknown, fallback: number, min: number, max: number): number {
  const parsed = typeof raw === 'string' ? parseInt(raw, 10) : NaN
  if (isNaN(parsed)) {
    return fallback
  }
  return Math.min(Math.max(parsed, min), max)
}

/**
 * User id stored by the auth middleware
 */
export function getSessionUserId(res: Response): string {
  const userId: unknown = res.locals.userId
  if (typeof userId !== 'string') {
    throw new InvariantViolationError('Route reached without an authenticated session')
  }
  return userId
}
