import type {
  JobAction,
  RegisteredJob,
  RunResult,
  RunResultConsumer,
  ScheduleEntrySnapshot,
  SchedulerStatus,
} from '../data/types'
import { SchedulerStateError, UnknownJobError } from '../lib/errors'
import { ScheduleHeap } from '../lib/scheduleHeap'
import { consoleRunLogger } from './consoleRunLogger'
import { JobExecutor } from './jobExecutor'
import { JobRegistry } from './jobRegistry'
import { DEFAULT_RESULT_BUFFER_SIZE, RunResultSink } from './runResultSink'

/** Longest single sleep; longer waits re-check the clock */
export const MAX_TIMER_DELAY_MS = 60_000

export type CronSchedulerOptions = {
  /** Run results buffered before executions wait on the consumer */
  resultBufferSize?: number
  /** IANA zone cron fields are evaluated in. Defaults to UTC */
  timezone?: string
  consumer?: RunResultConsumer
}

/**
 * Fires registered jobs at the times their specs give.
 *
 * A single timer sleeps until the earliest entry. Jobs are dispatched without
 * waiting for them, so a slow job never delays others; a job that is still
 * running when its next time comes runs again concurrently. After a stall each
 * overdue job fires once and its next time is computed from the present.
 *
 * ```ts
 * const scheduler = new CronScheduler()
 * scheduler.register('vacuum', '@daily', new SqlStatementJob('VACUUM', executor))
 * scheduler.start()
 * // ...
 * await scheduler.stop()
 * ```
 */
export class CronScheduler {
  private readonly registry: JobRegistry
  private readonly sink: RunResultSink
  private readonly executor: JobExecutor
  private readonly heap = new ScheduleHeap<RegisteredJob>()
  private readonly inFlight = new Set<Promise<void>>()
  private consumer: RunResultConsumer
  private status: SchedulerStatus = 'idle'
  private timer: NodeJS.Timeout | null = null
  private stopping: Promise<void> | null = null

  constructor(options: CronSchedulerOptions = {}) {
    this.registry = new JobRegistry({ timezone: options.timezone })
    this.sink = new RunResultSink(options.resultBufferSize ?? DEFAULT_RESULT_BUFFER_SIZE)
    this.executor = new JobExecutor(this.sink)
    this.consumer = options.consumer ?? consoleRunLogger
  }

  /**
   * Add a job. Only allowed before `start()`.
   *
   * @throws InvalidSpecError, DuplicateJobNameError or SchedulerStateError
   */
  register(name: string, spec: string, action: JobAction): RegisteredJob {
    return this.registry.register(name, spec, action)
  }

  /** Replace the default console consumer. Only allowed before `start()`. */
  setConsumer(consumer: RunResultConsumer): void {
    if (this.status !== 'idle') {
      throw new SchedulerStateError(`Cannot change the result consumer while the scheduler is ${this.status}`)
    }
    this.consumer = consumer
  }

  start(): void {
    if (this.status === 'running') {
      console.warn('[cronjobs] Already running')
      return
    }
    if (this.status === 'stopped') {
      throw new SchedulerStateError('A stopped scheduler cannot be restarted')
    }

    this.registry.freeze()
    const now = new Date()
    for (const job of this.registry.list()) {
      const runAt = this.registry.initialRunAt(job.name)
      if (runAt && runAt.getTime() > now.getTime()) {
        this.heap.push(job, runAt.getTime())
      } else {
        this.schedule(job, now)
      }
    }

    this.sink.start(this.consumer)
    this.status = 'running'
    console.log(`[cronjobs] Started with ${this.registry.size} job(s)`)
    this.arm()
  }

  /**
   * Stop firing, wait for running jobs to deliver their results, then let the
   * consumer drain. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown()
    }
    return this.stopping
  }

  /**
   * Run a job now, outside its schedule. The result also goes to the consumer.
   */
  trigger(name: string): Promise<RunResult> {
    if (this.status !== 'running') {
      throw new SchedulerStateError(`Cannot trigger job "${name}" while the scheduler is ${this.status}`)
    }
    const job = this.registry.get(name)
    if (!job) {
      throw new UnknownJobError(name)
    }
    return this.dispatch(job)
  }

  getEntries(): ScheduleEntrySnapshot[] {
    if (this.status === 'idle') {
      const now = new Date()
      return this.registry
        .list()
        .map((job) => ({
          name: job.name,
          spec: job.spec.source,
          nextRunAt: this.registry.initialRunAt(job.name) ?? job.spec.next(now),
        }))
        .sort((a, b) => a.nextRunAt.getTime() - b.nextRunAt.getTime())
    }
    return this.heap.toSortedArray().map((entry) => ({
      name: entry.value.name,
      spec: entry.value.spec.source,
      nextRunAt: new Date(entry.at),
    }))
  }

  getStatus(): SchedulerStatus {
    return this.status
  }

  getInFlightCount(): number {
    return this.inFlight.size
  }

  private async shutdown(): Promise<void> {
    const wasRunning = this.status === 'running'
    this.status = 'stopped'
    this.registry.freeze()
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }

    // Every producer has to finish before the sink closes
    await Promise.allSettled([...this.inFlight])
    await this.sink.close()

    if (wasRunning) {
      console.log('[cronjobs] Stopped')
    }
  }

  private arm(): void {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
    if (this.status !== 'running') return

    const next = this.heap.peek()
    if (!next) return

    const delay = Math.min(Math.max(next.at - Date.now(), 0), MAX_TIMER_DELAY_MS)
    this.timer = setTimeout(() => this.onTimer(), delay)
  }

  private onTimer(): void {
    this.timer = null
    if (this.status !== 'running') return

    const now = Date.now()
    let due = this.heap.peek()
    while (due && due.at <= now) {
      this.heap.pop()
      const job = due.value
      void this.dispatch(job)
      this.schedule(job, new Date(Math.max(now, due.at)))
      due = this.heap.peek()
    }

    this.arm()
  }

  /**
   * Queue the job's next occurrence after `from`. A job whose spec has no
   * further occurrence leaves the schedule; the others are unaffected.
   */
  private schedule(job: RegisteredJob, from: Date): void {
    let nextRunAt: Date
    try {
      nextRunAt = job.spec.next(from)
    } catch (error: unknown) {
      console.error(`[cronjobs] Job "${job.name}" removed from the schedule:`, error)
      return
    }
    this.heap.push(job, nextRunAt.getTime())
  }

  private dispatch(job: RegisteredJob): Promise<RunResult> {
    const execution = this.executor.execute(job)
    const tracked: Promise<void> = execution
      .then(
        () => undefined,
        (error: unknown) => {
          console.error(`[cronjobs] Lost result of job "${job.name}":`, error)
        },
      )
      .finally(() => {
        this.inFlight.delete(tracked)
      })
    this.inFlight.add(tracked)
    return execution
  }
}
