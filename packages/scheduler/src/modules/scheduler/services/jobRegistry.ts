import type { ExecutableJob, JobAction, RegisteredJob } from '../data/types'
import { DuplicateJobNameError, InvalidSpecError, SchedulerStateError } from '../lib/errors'
import { parseTimeSpec } from '../lib/timeSpec'

export type JobRegistryOptions = {
  timezone?: string
}

function toExecutableJob(action: JobAction): ExecutableJob {
  if (typeof action !== 'function') return action
  return {
    run: async () => {
      await action()
    },
  }
}

/**
 * Registered jobs and the first run each one got when it was added.
 * Frozen once the scheduler starts.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, RegisteredJob>()
  private readonly initialRuns = new Map<string, Date>()
  private frozen = false

  constructor(private readonly options: JobRegistryOptions = {}) {}

  register(name: string, specText: string, action: JobAction, now: Date = new Date()): RegisteredJob {
    if (this.frozen) {
      throw new SchedulerStateError(`Cannot register job "${name}" after the scheduler has started`)
    }
    if (name.trim() === '') {
      throw new InvalidSpecError(specText, 'Job name cannot be empty')
    }
    if (this.jobs.has(name)) {
      throw new DuplicateJobNameError(name)
    }

    const spec = parseTimeSpec(specText, { timezone: this.options.timezone })
    const job: RegisteredJob = { name, spec, job: toExecutableJob(action) }
    this.jobs.set(name, job)
    this.initialRuns.set(name, spec.next(now))
    return job
  }

  get(name: string): RegisteredJob | undefined {
    return this.jobs.get(name)
  }

  list(): RegisteredJob[] {
    return [...this.jobs.values()]
  }

  get size(): number {
    return this.jobs.size
  }

  initialRunAt(name: string): Date | undefined {
    return this.initialRuns.get(name)
  }

  freeze(): void {
    this.frozen = true
  }
}
