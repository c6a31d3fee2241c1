import { parseExpression } from 'cron-parser'

/**
 * Shorthand descriptors and the expressions they stand for
 */
export const CRON_DESCRIPTORS: Readonly<Record<string, string>> = {
  '@yearly': '0 0 1 1 *',
  '@annually': '0 0 1 1 *',
  '@monthly': '0 0 1 * *',
  '@weekly': '0 0 * * 0',
  '@daily': '0 0 * * *',
  '@midnight': '0 0 * * *',
  '@hourly': '0 * * * *',
}

/**
 * Replace a descriptor such as `@daily` by its expression. Anything else is
 * returned trimmed.
 */
export function expandCronDescriptor(cronExpression: string): string {
  const trimmed = cronExpression.trim()
  return CRON_DESCRIPTORS[trimmed.toLowerCase()] ?? trimmed
}

function countFields(cronExpression: string): number {
  return cronExpression.trim().split(/\s+/).filter(f => f.length > 0).length
}

function checkShape(cronExpression: string): string | null {
  if (!cronExpression || cronExpression.trim() === '') {
    return 'Cron expression cannot be empty'
  }
  const expanded = expandCronDescriptor(cronExpression)
  if (expanded.startsWith('@')) {
    return `Unknown descriptor: ${expanded}`
  }
  const fields = countFields(expanded)
  if (fields !== 5 && fields !== 6) {
    return `Expected 5 or 6 fields, got ${fields}`
  }
  return null
}

/**
 * Why a cron expression cannot be used, or null when it can. Values out of
 * range and dates that never occur (`0 0 30 2 *`) are caught by computing the
 * first occurrence.
 */
export function validateCron(cronExpression: string, timezone: string = 'UTC'): string | null {
  const shapeError = checkShape(cronExpression)
  if (shapeError) {
    return shapeError
  }

  try {
    nextCronRun(cronExpression, timezone, new Date())
    return null
  } catch (error) {
    return error instanceof Error ? error.message : 'Invalid cron expression'
  }
}

/**
 * First occurrence strictly after `after`
 */
export function nextCronRun(cronExpression: string, timezone: string, after: Date): Date {
  const interval = parseExpression(expandCronDescriptor(cronExpression), {
    currentDate: after,
    tz: timezone,
  })

  let next = interval.next().toDate()
  while (next.getTime() <= after.getTime()) {
    next = interval.next().toDate()
  }
  return next
}
