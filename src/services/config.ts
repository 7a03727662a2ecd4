/**
 * Economy Configuration Service
 * Provides access to economy settings (bonus, consolation, giveaways, ...)
 *
 * Priority: ENV value > hardcoded default
 */

import type { EconomyConfig } from '../types/index.js'
import { DEFAULT_ECONOMY_CONFIG } from '../types/index.js'
import { isValidTimeZone } from '../utils/timezone.js'
import { logger } from '../utils/logger.js'

/** Cached config */
let cachedConfig: EconomyConfig | null = null

/**
 * Clear the config cache (call after changing the environment)
 */
export function clearConfigCache(): void {
  cachedConfig = null
}

function parsePositive(raw: string | undefined): number | undefined {
  const value = parseFloat(raw || '')
  return !isNaN(value) && value > 0 ? value : undefined
}

/**
 * Whole count of at least 1 (fractions are floored)
 */
function parseCount(raw: string | undefined): number | undefined {
  const value = parsePositive(raw)
  if (value === undefined) {
    return undefined
  }
  const count = Math.floor(value)
  return count >= 1 ? count : undefined
}

function parseNonNegative(raw: string | undefined): number | undefined {
  const value = parseFloat(raw || '')
  return !isNaN(value) && value >= 0 ? value : undefined
}

/**
 * Parse a comma-separated list of positive numbers
 */
function parsePriceList(raw: string | undefined): number[] | undefined {
  if (!raw) {
    return undefined
  }

  const prices = raw.split(',').map(p => parseFloat(p.trim()))
  if (prices.length === 0 || prices.some(p => isNaN(p) || p <= 0)) {
    logger.warn({ raw }, 'Ignoring invalid LOOTCASE_GIVEAWAY_ENTRY_PRICES')
    return undefined
  }
  return prices
}

/**
 * Get environment variable overrides
 */
function getEnvOverrides(): Partial<EconomyConfig> {
  const consolationRate = parseNonNegative(process.env.LOOTCASE_CONSOLATION_RATE)
  const timeZone = process.env.LOOTCASE_DAILY_RESET_TZ

  if (timeZone && !isValidTimeZone(timeZone)) {
    logger.warn({ timeZone }, 'Ignoring unknown LOOTCASE_DAILY_RESET_TZ')
  }

  return {
    startingBalance: parseNonNegative(process.env.LOOTCASE_STARTING_BALANCE),
    bonusAmount: parsePositive(process.env.LOOTCASE_BONUS_AMOUNT),
    bonusCooldownMinutes: parsePositive(process.env.LOOTCASE_BONUS_COOLDOWN_MINUTES),
    consolationRate: consolationRate !== undefined && consolationRate < 1 ? consolationRate : undefined,
    giveawayIntervalHours: parsePositive(process.env.LOOTCASE_GIVEAWAY_INTERVAL_HOURS),
    giveawayEntryPrices: parsePriceList(process.env.LOOTCASE_GIVEAWAY_ENTRY_PRICES),
    giveawayCount: parseCount(process.env.LOOTCASE_GIVEAWAY_COUNT),
    feedLimit: parseCount(process.env.LOOTCASE_FEED_LIMIT),
    dailyResetTimeZone: timeZone && isValidTimeZone(timeZone) ? timeZone : undefined,
  }
}

/**
 * Get economy configuration
 */
export function getEconomyConfig(): EconomyConfig {
  if (cachedConfig) {
    return cachedConfig
  }

  const overrides = getEnvOverrides()

  cachedConfig = {
    startingBalance: overrides.startingBalance ?? DEFAULT_ECONOMY_CONFIG.startingBalance,
    bonusAmount: overrides.bonusAmount ?? DEFAULT_ECONOMY_CONFIG.bonusAmount,
    bonusCooldownMinutes: overrides.bonusCooldownMinutes ?? DEFAULT_ECONOMY_CONFIG.bonusCooldownMinutes,
    consolationRate: overrides.consolationRate ?? DEFAULT_ECONOMY_CONFIG.consolationRate,
    giveawayIntervalHours: overrides.giveawayIntervalHours ?? DEFAULT_ECONOMY_CONFIG.giveawayIntervalHours,
    giveawayEntryPrices: overrides.giveawayEntryPrices ?? DEFAULT_ECONOMY_CONFIG.giveawayEntryPrices,
    giveawayCount: overrides.giveawayCount ?? DEFAULT_ECONOMY_CONFIG.giveawayCount,
    giveawayRarities: DEFAULT_ECONOMY_CONFIG.giveawayRarities,
    feedLimit: overrides.feedLimit ?? DEFAULT_ECONOMY_CONFIG.feedLimit,
    dailyResetTimeZone: overrides.dailyResetTimeZone ?? DEFAULT_ECONOMY_CONFIG.dailyResetTimeZone,
  }

  return cachedConfig
}
