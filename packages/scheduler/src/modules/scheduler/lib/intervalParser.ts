const INTERVAL_FORMAT = /^(?:\d+(?:ms|s|m|h|d))+$/
const INTERVAL_PART = /(\d+)(ms|s|m|h|d)/g

const MIN_DELAY_MS = 1000

/** Longest accepted interval, a little over 292 years */
export const MAX_INTERVAL_MS = 9_223_372_036_854

function unitToMs(unit: string): number {
  switch (unit) {
    case 'ms':
      return 1
    case 's':
      return 1000
    case 'm':
      return 60 * 1000
    case 'h':
      return 60 * 60 * 1000
    case 'd':
      return 24 * 60 * 60 * 1000
    default:
      throw new Error(`Unknown interval unit: ${unit}`)
  }
}

/**
 * Parse interval strings like '15m', '2h', '1m30s' into milliseconds
 */
export function parseInterval(interval: string): number {
  const trimmed = interval.trim()
  if (!INTERVAL_FORMAT.test(trimmed)) {
    throw new Error(`Invalid interval format: ${interval}. Expected format: <number><unit>[<number><unit>...] (e.g., 30s, 15m, 1h30m)`)
  }

  let total = 0
  for (const match of trimmed.matchAll(INTERVAL_PART)) {
    total += parseInt(match[1], 10) * unitToMs(match[2])
  }
  if (!Number.isSafeInteger(total) || total > MAX_INTERVAL_MS) {
    throw new Error(`Interval too long: ${interval}. The maximum is ${MAX_INTERVAL_MS}ms`)
  }
  return total
}

/**
 * Effective delay between two runs: whole seconds only, never below one second.
 */
export function intervalDelayMs(intervalMs: number): number {
  if (intervalMs < MIN_DELAY_MS) return MIN_DELAY_MS
  return intervalMs - (intervalMs % 1000)
}

/**
 * Calculate next run time based on interval.
 * The base instant is truncated to the whole second, so runs stay on
 * second boundaries.
 */
export function calculateNextRunFromInterval(
  interval: string,
  fromDate: Date = new Date()
): Date {
  const delay = intervalDelayMs(parseInterval(interval))
  const base = fromDate.getTime() - (fromDate.getTime() % 1000)
  return new Date(base + delay)
}
