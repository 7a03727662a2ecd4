/**
 * Day-boundary utilities
 *
 * The daily case counter resets at midnight in the configured time zone
 * (UTC unless LOOTCASE_DAILY_RESET_TZ says otherwise).
 */

/**
 * Get the YYYY-MM-DD date string for a moment in the given time zone.
 */
export function getDayKey(date: Date, timeZone: string): string {
  // en-CA formats dates as YYYY-MM-DD
  return date.toLocaleDateString('en-CA', { timeZone })
}

/**
 * Check whether an IANA time zone identifier is usable by Intl.
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone })
    return true
  } catch {
    return false
  }
}
