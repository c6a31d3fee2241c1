import type { BoundedQueue, BoundedQueueOptions, QueueCounts } from '../types'
import { QueueClosedError } from '../errors'

/** Default number of buffered items */
export const DEFAULT_QUEUE_CAPACITY = 128

type Slot<T> = { item: T }

type BlockedProducer<T> = {
  item: T
  resolve: () => void
}

type WaitingConsumer<T> = (result: IteratorResult<T, undefined>) => void

const DONE: IteratorReturnResult<undefined> = { value: undefined, done: true }

/**
 * Creates an in-memory bounded queue.
 *
 * Items are delivered in FIFO order. Producers of a full queue wait in FIFO
 * order too, so nothing is dropped and nothing overtakes.
 *
 * @template T - The item type
 * @param name - Queue name (used in error messages)
 * @param options - Queue options
 */
export function createBoundedQueue<T>(
  name: string,
  options?: BoundedQueueOptions
): BoundedQueue<T> {
  const capacity = options?.capacity ?? DEFAULT_QUEUE_CAPACITY
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Queue "${name}" capacity must be a positive integer, got ${capacity}`)
  }

  const buffer: Slot<T>[] = []
  const blocked: BlockedProducer<T>[] = []
  const waiting: WaitingConsumer<T>[] = []
  let closed = false

  function enqueue(item: T): Promise<void> {
    if (closed) {
      return Promise.reject(new QueueClosedError(name))
    }

    const consumer = waiting.shift()
    if (consumer) {
      consumer({ value: item, done: false })
      return Promise.resolve()
    }

    if (buffer.length < capacity) {
      buffer.push({ item })
      return Promise.resolve()
    }

    return new Promise<void>((resolve) => {
      blocked.push({ item, resolve })
    })
  }

  function dequeue(): Promise<IteratorResult<T, undefined>> {
    const head = buffer.shift()
    if (head) {
      // A slot was freed: admit the oldest blocked producer
      const producer = blocked.shift()
      if (producer) {
        buffer.push({ item: producer.item })
        producer.resolve()
      }
      const next: IteratorYieldResult<T> = { value: head.item, done: false }
      return Promise.resolve(next)
    }

    if (closed) {
      return Promise.resolve(DONE)
    }

    return new Promise((resolve) => {
      waiting.push(resolve)
    })
  }

  function close(): void {
    if (closed) return
    closed = true
    // Consumers only wait on an empty queue, so they are done now
    for (const consumer of waiting.splice(0)) {
      consumer(DONE)
    }
  }

  function getCounts(): QueueCounts {
    return {
      buffered: buffer.length,
      blocked: blocked.length,
      waiting: waiting.length,
    }
  }

  return {
    name,
    capacity,
    get closed() {
      return closed
    },
    enqueue,
    dequeue,
    close,
    getCounts,
    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
      return { next: dequeue }
    },
  }
}
