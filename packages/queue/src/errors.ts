export class QueueClosedError extends Error {
  readonly queueName: string

  constructor(queueName: string) {
    super(`Queue "${queueName}" is closed`)
    this.name = 'QueueClosedError'
    this.queueName = queueName
  }
}
