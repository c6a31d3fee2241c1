import { z } from 'zod'
import { getDatabaseUrl } from '@sqlcron/shared/lib/db/connection'
import { formatIssues } from './data/validators'
import { SchedulerConfigError } from './lib/errors'
import { isKnownTimezone } from './lib/timeSpec'
import { DEFAULT_RESULT_BUFFER_SIZE } from './services/runResultSink'

export const DEFAULT_JOBS_DIR = './cronjobs'
export const DEFAULT_TIMEZONE = 'UTC'

export const schedulerConfigSchema = z.object({
  databaseUrl: z.string().min(1),
  jobsDir: z.string().min(1),
  resultBufferSize: z.coerce.number().int().positive(),
  timezone: z.string().refine(isKnownTimezone, { message: 'Unknown timezone' }),
})

export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>

type Env = Record<string, string | undefined>

/**
 * Read scheduler settings from the environment.
 *
 * - `CRONJOBS_DATABASE_URL` / `DATABASE_URL`
 * - `CRONJOBS_DIR` (default `./cronjobs`)
 * - `CRONJOBS_RESULT_BUFFER` (default 128)
 * - `CRONJOBS_TIMEZONE` (default `UTC`)
 */
export function loadSchedulerConfig(env: Env = process.env): SchedulerConfig {
  const parsed = schedulerConfigSchema.safeParse({
    databaseUrl: getDatabaseUrl('CRONJOBS', env),
    jobsDir: env.CRONJOBS_DIR || DEFAULT_JOBS_DIR,
    resultBufferSize: env.CRONJOBS_RESULT_BUFFER || DEFAULT_RESULT_BUFFER_SIZE,
    timezone: env.CRONJOBS_TIMEZONE || DEFAULT_TIMEZONE,
  })
  if (!parsed.success) {
    throw new SchedulerConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`)
  }
  return parsed.data
}
