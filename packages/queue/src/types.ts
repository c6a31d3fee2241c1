/**
 * Queue Package Type Definitions
 *
 * A bounded, in-process FIFO queue that hands items from any number of
 * producers to consumers, blocking producers while the buffer is full.
 */

// ============================================================================
// Options
// ============================================================================

/**
 * Options for the in-memory bounded queue.
 */
export type BoundedQueueOptions = {
  /** Maximum number of buffered items before `enqueue` waits. Defaults to 128 */
  capacity?: number
}

// ============================================================================
// Queue Interface
// ============================================================================

/**
 * Snapshot of queue occupancy.
 */
export type QueueCounts = {
  /** Items sitting in the buffer */
  buffered: number
  /** Producers waiting for buffer space */
  blocked: number
  /** Consumers waiting for an item */
  waiting: number
}

/**
 * Bounded queue shared between producers and a consumer.
 * @template T - The item type carried by this queue
 */
export interface BoundedQueue<T> extends AsyncIterable<T> {
  /** Name of this queue, used in error messages */
  readonly name: string
  /** Buffer capacity */
  readonly capacity: number
  /** True once `close()` has been called */
  readonly closed: boolean

  /**
   * Add an item to the queue.
   *
   * Resolves as soon as the item is buffered or handed to a waiting consumer.
   * While the buffer is full the promise stays pending (backpressure).
   * Rejects with `QueueClosedError` when the queue is already closed.
   */
  enqueue(item: T): Promise<void>

  /**
   * Take the next item. Resolves with `done: true` once the queue is closed
   * and fully drained.
   */
  dequeue(): Promise<IteratorResult<T, undefined>>

  /**
   * Close the queue. Items already buffered, and items of producers blocked
   * before the close, are still delivered. Calling it again has no effect.
   */
  close(): void

  /**
   * Get current occupancy.
   */
  getCounts(): QueueCounts
}
