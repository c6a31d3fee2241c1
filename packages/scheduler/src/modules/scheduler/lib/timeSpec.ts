import { nextCronRun, validateCron } from './cronParser'
import { calculateNextRunFromInterval, parseInterval } from './intervalParser'
import { InvalidSpecError } from './errors'

export type TimeSpecKind = 'cron' | 'interval'

/**
 * A parsed schedule. `next` is deterministic: the same instant always yields
 * the same occurrence, and that occurrence is strictly later.
 */
export interface TimeSpec {
  readonly source: string
  readonly kind: TimeSpecKind
  /** Zone cron fields are evaluated in */
  readonly timezone: string
  /** @throws InvalidSpecError when no representable occurrence follows `after` */
  next(after: Date): Date
}

export type TimeSpecOptions = {
  /** IANA zone cron fields are evaluated in. Defaults to UTC */
  timezone?: string
}

const EVERY_PATTERN = /^@every(?:\s+(.*))?$/i
// `CRON_TZ=Europe/Warsaw 0 9 * * *` overrides the zone for one spec
const ZONE_PREFIX = /^(?:CRON_TZ|TZ)=(\S*)(?:\s+(.*))?$/

export function isKnownTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone })
    return true
  } catch {
    return false
  }
}

function guarded(text: string, next: (after: Date) => Date): (after: Date) => Date {
  return (after) => {
    const at = next(after)
    if (Number.isNaN(at.getTime())) {
      throw new InvalidSpecError(text, `No occurrence after ${after.toISOString()} fits in a date`)
    }
    return at
  }
}

/**
 * Parse a cron-style expression, a descriptor (`@daily`) or `@every <duration>`.
 * A leading `CRON_TZ=<zone>` or `TZ=<zone>` sets the zone for this spec only.
 *
 * @throws InvalidSpecError when the text does not describe a schedule
 */
export function parseTimeSpec(text: string, options: TimeSpecOptions = {}): TimeSpec {
  let source = text.trim()
  let timezone = options.timezone ?? 'UTC'

  if (source === '') {
    throw new InvalidSpecError(text, 'Time spec cannot be empty')
  }

  const zone = ZONE_PREFIX.exec(source)
  if (zone) {
    if (!zone[1] || !isKnownTimezone(zone[1])) {
      throw new InvalidSpecError(text, `Unknown timezone: ${zone[1] ?? ''}`)
    }
    timezone = zone[1]
    source = (zone[2] ?? '').trim()
    if (source === '') {
      throw new InvalidSpecError(text, 'Time spec cannot be empty')
    }
  }

  const every = EVERY_PATTERN.exec(source)
  if (every) {
    const interval = (every[1] ?? '').trim()
    let intervalMs: number
    try {
      intervalMs = parseInterval(interval)
    } catch (error) {
      throw new InvalidSpecError(text, error instanceof Error ? error.message : String(error))
    }
    if (intervalMs <= 0) {
      throw new InvalidSpecError(text, 'Interval must be greater than zero')
    }
    return {
      source: text.trim(),
      kind: 'interval',
      timezone,
      next: guarded(text, (after) => calculateNextRunFromInterval(interval, after)),
    }
  }

  const cronError = validateCron(source, timezone)
  if (cronError) {
    throw new InvalidSpecError(text, cronError)
  }
  return {
    source: text.trim(),
    kind: 'cron',
    timezone,
    next: guarded(text, (after) => nextCronRun(source, timezone, after)),
  }
}

/**
 * The next `count` occurrences after `from`
 */
export function listOccurrences(spec: TimeSpec, count: number, from: Date = new Date()): Date[] {
  const occurrences: Date[] = []
  let cursor = from
  for (let i = 0; i < count; i++) {
    cursor = spec.next(cursor)
    occurrences.push(cursor)
  }
  return occurrences
}
