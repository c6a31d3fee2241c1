import type { Module } from '@sqlcron/shared/modules/registry'
import cli from './cli'

export const metadata = {
  name: 'Scheduler',
  description: 'Runs SQL job files on cron schedules',
  version: '0.1.0',
}

export const schedulerModule: Module = {
  id: 'scheduler',
  info: metadata,
  cli,
}

export { CronScheduler, MAX_TIMER_DELAY_MS, type CronSchedulerOptions } from './services/cronScheduler'
export { JobRegistry } from './services/jobRegistry'
export { JobExecutor, type RunResultSender } from './services/jobExecutor'
export { RunResultSink, DEFAULT_RESULT_BUFFER_SIZE } from './services/runResultSink'
export { consoleRunLogger, formatRunResult } from './services/consoleRunLogger'
export { parseTimeSpec, listOccurrences, type TimeSpec, type TimeSpecOptions } from './lib/timeSpec'
export { EntityManagerStatementExecutor, SqlStatementJob, type StatementExecutor } from './lib/statementExecutor'
export { readJobFiles, loadJobsFromDirectory, type JobLoadReport, type JobFileFailure } from './lib/jobFileReader'
export { loadSchedulerConfig, type SchedulerConfig } from './config'
export * from './lib/errors'
export type * from './data/types'
