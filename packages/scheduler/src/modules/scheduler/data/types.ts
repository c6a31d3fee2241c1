import type { TimeSpec } from '../lib/timeSpec'

/**
 * Something the scheduler can run. A rejected promise (or a throw) is the
 * job's failure and ends up in its run result.
 */
export interface ExecutableJob {
  run(): Promise<void>
}

/** What `register` accepts: a job object or a plain function */
export type JobAction = ExecutableJob | (() => Promise<void> | void)

export type RegisteredJob = {
  readonly name: string
  readonly spec: TimeSpec
  readonly job: ExecutableJob
}

/**
 * Outcome of one job execution
 */
export type RunResult = {
  readonly name: string
  /** null on success */
  readonly error: Error | null
  readonly durationMs: number
  readonly startedAt: Date
}

export type RunResultConsumer = (run: RunResult) => Promise<void> | void

export type ScheduleEntrySnapshot = {
  name: string
  spec: string
  nextRunAt: Date
}

export type SchedulerStatus = 'idle' | 'running' | 'stopped'
