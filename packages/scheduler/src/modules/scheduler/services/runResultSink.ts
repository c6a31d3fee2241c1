import { createBoundedQueue, DEFAULT_QUEUE_CAPACITY, type BoundedQueue } from '@sqlcron/queue'
import type { RunResult, RunResultConsumer } from '../data/types'
import type { RunResultSender } from './jobExecutor'

export const DEFAULT_RESULT_BUFFER_SIZE = DEFAULT_QUEUE_CAPACITY

/**
 * Buffered hand-off between job executions and a single consumer task.
 *
 * `send` waits while `capacity` results are pending. `close` ends intake and
 * resolves once the consumer has seen every buffered result.
 */
export class RunResultSink implements RunResultSender {
  private readonly queue: BoundedQueue<RunResult>
  private consumerTask: Promise<void> | null = null

  constructor(capacity: number = DEFAULT_RESULT_BUFFER_SIZE) {
    this.queue = createBoundedQueue<RunResult>('run-results', { capacity })
  }

  get capacity(): number {
    return this.queue.capacity
  }

  get pending(): number {
    const counts = this.queue.getCounts()
    return counts.buffered + counts.blocked
  }

  start(consumer: RunResultConsumer): void {
    if (this.consumerTask) {
      console.warn('[cronjobs:results] Consumer already running')
      return
    }
    this.consumerTask = this.consume(consumer)
  }

  send(result: RunResult): Promise<void> {
    return this.queue.enqueue(result)
  }

  async close(): Promise<void> {
    this.queue.close()
    if (this.consumerTask) {
      await this.consumerTask
    }
  }

  private async consume(consumer: RunResultConsumer): Promise<void> {
    for await (const run of this.queue) {
      try {
        await consumer(run)
      } catch (error: unknown) {
        console.error(`[cronjobs:results] Consumer failed on ${run.name}:`, error)
      }
    }
  }
}
