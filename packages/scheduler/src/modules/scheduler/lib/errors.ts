export type SchedulerErrorCode =
  | 'INVALID_SPEC'
  | 'DUPLICATE_NAME'
  | 'INVALID_STATE'
  | 'UNKNOWN_JOB'
  | 'INVALID_JOB_FILE'
  | 'INVALID_CONFIG'

/**
 * Base class for errors raised by the scheduler itself. Job failures are
 * never thrown as these; they travel inside run results.
 */
export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode

  constructor(code: SchedulerErrorCode, message: string) {
    super(message)
    this.name = 'SchedulerError'
    this.code = code
  }
}

export class InvalidSpecError extends SchedulerError {
  readonly spec: string

  constructor(spec: string, reason: string) {
    super('INVALID_SPEC', `Invalid time spec "${spec}": ${reason}`)
    this.name = 'InvalidSpecError'
    this.spec = spec
  }
}

export class DuplicateJobNameError extends SchedulerError {
  readonly jobName: string

  constructor(jobName: string) {
    super('DUPLICATE_NAME', `Job "${jobName}" is already registered`)
    this.name = 'DuplicateJobNameError'
    this.jobName = jobName
  }
}

export class SchedulerStateError extends SchedulerError {
  constructor(message: string) {
    super('INVALID_STATE', message)
    this.name = 'SchedulerStateError'
  }
}

export class UnknownJobError extends SchedulerError {
  readonly jobName: string

  constructor(jobName: string) {
    super('UNKNOWN_JOB', `Job "${jobName}" is not registered`)
    this.name = 'UnknownJobError'
    this.jobName = jobName
  }
}

export class JobFileError extends SchedulerError {
  readonly filePath: string

  constructor(filePath: string, reason: string) {
    super('INVALID_JOB_FILE', `File ${filePath}: ${reason}`)
    this.name = 'JobFileError'
    this.filePath = filePath
  }
}

export class SchedulerConfigError extends SchedulerError {
  constructor(message: string) {
    super('INVALID_CONFIG', message)
    this.name = 'SchedulerConfigError'
  }
}

/**
 * Normalize anything a job may throw into an Error. Error instances are
 * returned as-is so callers can still inspect them.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value
  return new Error(String(value))
}
