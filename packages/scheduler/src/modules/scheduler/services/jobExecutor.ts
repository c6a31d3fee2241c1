import type { RegisteredJob, RunResult } from '../data/types'
import { toError } from '../lib/errors'

export interface RunResultSender {
  send(result: RunResult): Promise<void>
}

/**
 * Runs one job, times it, and hands exactly one result to the sink.
 * A failing job resolves normally; its error is part of the result.
 */
export class JobExecutor {
  constructor(private readonly sink: RunResultSender) {}

  async execute(job: RegisteredJob): Promise<RunResult> {
    const startedAt = new Date()
    let error: Error | null = null

    try {
      await job.job.run()
    } catch (err: unknown) {
      error = toError(err)
    }

    const result: RunResult = {
      name: job.name,
      error,
      durationMs: Date.now() - startedAt.getTime(),
      startedAt,
    }

    // Waits while the sink is full
    await this.sink.send(result)
    return result
  }
}
