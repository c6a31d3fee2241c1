export * from './types'
export { QueueClosedError } from './errors'
export { createBoundedQueue, DEFAULT_QUEUE_CAPACITY } from './strategies/memory'
