/**
 * Time parsing and manipulation utilities
 */

import type { Duration } from '../core/types'

/**
 * Time unit multipliers in milliseconds
 */
const TIME_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
}

/**
 * Extended time unit names
 */
const TIME_UNIT_ALIASES: Record<string, string> = {
  millisecond: 'ms',
  milliseconds: 'ms',
  second: 's',
  seconds: 's',
  sec: 's',
  secs: 's',
  minute: 'm',
  minutes: 'm',
  min: 'm',
  mins: 'm',
  hour: 'h',
  hours: 'h',
  hr: 'h',
  hrs: 'h',
  day: 'd',
  days: 'd',
}

/**
 * Parse a duration string or number to milliseconds
 *
 * @example
 * ```typescript
 * parseDuration('5m')       // 300000 (default cookie expiry)
 * parseDuration('300s')     // 300000
 * parseDuration(60000)      // 60000 (already in ms)
 * parseDuration('1h 30m')   // 5400000
 * ```
 *
 * @throws Error if the duration format is invalid
 */
export function parseDuration(duration: Duration | string): number {
  if (typeof duration === 'number') {
    if (duration < 0 || !Number.isFinite(duration)) {
      throw new Error(`Invalid duration: ${duration}. Duration must be non-negative.`)
    }
    return duration
  }

  const input = duration.trim().toLowerCase()

  if (!input) {
    throw new Error('Invalid duration: empty string')
  }

  // Plain numeric strings are milliseconds
  const numericValue = Number(input)
  if (!isNaN(numericValue)) {
    if (numericValue < 0) {
      throw new Error(`Invalid duration: ${duration}. Duration must be non-negative.`)
    }
    return numericValue
  }

  // Compound durations like "1h 30m" or "1h30m"
  let totalMs = 0
  const regex = /(\d+(?:\.\d+)?)\s*([a-z]+)/g
  let match: RegExpExecArray | null
  let hasMatch = false

  while ((match = regex.exec(input)) !== null) {
    hasMatch = true
    const value = parseFloat(match[1])
    let unit = match[2]

    if (unit in TIME_UNIT_ALIASES) {
      unit = TIME_UNIT_ALIASES[unit]
    }

    const multiplier = TIME_UNITS[unit]
    if (multiplier === undefined) {
      throw new Error(
        `Invalid duration unit: "${unit}" in "${duration}". ` +
        `Valid units: s, m, h, d (or seconds, minutes, hours, days)`
      )
    }

    totalMs += value * multiplier
  }

  if (!hasMatch) {
    throw new Error(
      `Invalid duration format: "${duration}". ` +
      `Expected format like "5m", "1h", "300s", "1d", or "1h 30m"`
    )
  }

  return Math.floor(totalMs)
}

/**
 * Get the current timestamp in seconds (Unix timestamp)
 */
export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000)
}

/**
 * Zero-pad a calendar field to two digits
 */
export function pad2(value: number): string {
  return value.toString().padStart(2, '0')
}
