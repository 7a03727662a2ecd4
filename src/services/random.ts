/**
 * Random Selection Service
 * Weighted sampling for case drops, upgrade trials and giveaway draws
 */

import { randomInt } from 'crypto'
import { InvalidDropTableError } from '../utils/errors.js'

/**
 * Source of uniform floats in [0, 1)
 */
export interface RandomSource {
  next(): number
}

export interface WeightedEntry<T> {
  value: T
  weight: number
}

// crypto.randomInt requires max - min < 2^48
const RANDOM_RANGE = 2 ** 48 - 1

/**
 * Default source backed by the OS CSPRNG. Every call is a fresh draw.
 */
export const secureRandom: RandomSource = {
  next: () => randomInt(0, RANDOM_RANGE) / RANDOM_RANGE,
}

/**
 * Pick one entry with probability weight / total weight.
 *
 * Draws r in [0, total) and returns the first entry whose cumulative weight exceeds r.
 */
export function weightedPick<T>(
  entries: ReadonlyArray<WeightedEntry<T>>,
  source: RandomSource = secureRandom
): T {
  if (entries.length === 0) {
    throw new InvalidDropTableError('no entries')
  }

  let total = 0
  for (const entry of entries) {
    if (!Number.isFinite(entry.weight) || entry.weight < 0) {
      throw new InvalidDropTableError(`weight must be a non-negative number, got ${entry.weight}`)
    }
    total += entry.weight
  }

  if (total <= 0) {
    throw new InvalidDropTableError('total weight must be positive')
  }

  const r = source.next() * total
  let cumulative = 0
  let last: T | undefined
  for (const entry of entries) {
    if (entry.weight === 0) {
      continue
    }
    cumulative += entry.weight
    last = entry.value
    if (cumulative > r) {
      return entry.value
    }
  }

  // Float rounding can leave r a hair above the final sum
  if (last === undefined) {
    throw new InvalidDropTableError('total weight must be positive')
  }
  return last
}

/**
 * Bernoulli trial: true iff a uniform draw in [0, 100) is below chance.
 */
export function weightedTrial(chance: number, source: RandomSource = secureRandom): boolean {
  if (!Number.isFinite(chance) || chance < 0 || chance > 100) {
    throw new RangeError(`chance must be within 0..100, got ${chance}`)
  }
  return source.next() * 100 < chance
}

/**
 * Uniform pick from a non-empty list
 */
export function pickOne<T>(values: readonly T[], source: RandomSource = secureRandom): T {
  if (values.length === 0) {
    throw new RangeError('cannot pick from an empty list')
  }
  const index = Math.min(values.length - 1, Math.floor(source.next() * values.length))
  return values[index]
}
